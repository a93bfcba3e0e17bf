/**
 * Postgres engine for sqlgate.
 * Uses a process-lifetime `pg` pool with strict safety defaults.
 */

import pg from 'pg';
import type { QueryArrayConfig, QueryArrayResult } from 'pg';
import { SAFE_DEFAULTS } from '../defaults.js';
import { ConfigError } from '../../errors.js';
import type {
  ColumnInfo,
  DbConnection,
  DbEngine,
  EngineLimits,
  RowSet,
  SchemaSnapshot,
  TableInfo,
} from '../types.js';

const { Pool } = pg;

export interface PgConnectionConfig {
  connectionString: string;
}

/** The part of a checked-out `pg` client the engine talks to */
export interface PgSession {
  query(text: string): Promise<unknown>;
  query(config: QueryArrayConfig): Promise<QueryArrayResult>;
  release(err?: Error | boolean): void;
}

/** The part of a `pg` pool the engine talks to */
export interface PgPoolLike {
  connect(): Promise<PgSession>;
  end(): Promise<void>;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

const COLUMNS_SQL = `
  SELECT c.table_name, c.column_name, c.data_type, c.is_nullable,
         CASE WHEN pk.column_name IS NOT NULL THEN true ELSE false END AS is_pk
  FROM information_schema.columns c
  LEFT JOIN (
    SELECT ku.table_schema, ku.table_name, ku.column_name
    FROM information_schema.table_constraints tc
    JOIN information_schema.key_column_usage ku
      ON tc.constraint_name = ku.constraint_name
      AND tc.table_schema = ku.table_schema
    WHERE tc.constraint_type = 'PRIMARY KEY'
  ) pk ON pk.table_schema = c.table_schema
      AND pk.table_name = c.table_name
      AND pk.column_name = c.column_name
  WHERE c.table_schema = current_schema()
    AND c.table_name = ANY($1)
  ORDER BY c.table_name, c.ordinal_position
`;

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

class PgConnection implements DbConnection {
  private released = false;

  constructor(private readonly client: PgSession) {}

  /**
   * Run one statement inside a read-only transaction.
   *
   * The SQL should already be admitted (LIMIT injection is done upstream).
   */
  async run(sql: string): Promise<RowSet> {
    try {
      await this.client.query('BEGIN READ ONLY');
      const result = await this.client.query({ text: sql, rowMode: 'array' });
      await this.client.query('COMMIT');

      const columns = result.fields.map((f) => f.name);
      const rows: unknown[][] = result.rows;
      return { columns, rows };
    } catch (err: unknown) {
      try {
        await this.client.query('ROLLBACK');
      } catch {
        // connection is discarded on release
      }
      throw err;
    }
  }

  release(error?: Error): void {
    if (this.released) return;
    this.released = true;
    this.client.release(error);
  }
}

export class PostgresEngine implements DbEngine {
  readonly type = 'postgres' as const;
  private readonly pool: PgPoolLike;
  private lastIdleError: Error | null = null;

  constructor(cfg: PgConnectionConfig, limits: EngineLimits = {}, pool?: PgPoolLike) {
    if (!cfg.connectionString.trim()) {
      throw new ConfigError('Postgres connection string is required.');
    }
    this.pool =
      pool ??
      new Pool({
        connectionString: cfg.connectionString,
        max: limits.poolMax ?? SAFE_DEFAULTS.poolMax,
        connectionTimeoutMillis: limits.connectionTimeoutMs ?? SAFE_DEFAULTS.connectionTimeoutMs,
        statement_timeout: limits.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs,
      });
    // pg has already dropped the idle client; the next acquire opens a fresh one
    this.pool.on('error', (err) => {
      this.lastIdleError = err;
    });
  }

  /** Last error raised by an idle pooled client, if any */
  get idleError(): Error | null {
    return this.lastIdleError;
  }

  async acquire(): Promise<DbConnection> {
    const client = await this.pool.connect();
    return new PgConnection(client);
  }

  /**
   * Introspect the given tables: columns, primary keys and a few sample rows.
   */
  async introspect(tables: readonly string[]): Promise<SchemaSnapshot> {
    const client = await this.pool.connect();
    try {
      const colsRes = await client.query({
        text: COLUMNS_SQL,
        values: [[...tables]],
        rowMode: 'array',
      });

      const columnsByTable = new Map<string, ColumnInfo[]>();
      const columnRows: unknown[][] = colsRes.rows;
      for (const [tableName, columnName, dataType, isNullable, isPk] of columnRows) {
        const table = String(tableName);
        const columns = columnsByTable.get(table) ?? [];
        columns.push({
          name: String(columnName),
          dataType: String(dataType),
          nullable: isNullable === 'YES',
          isPrimaryKey: isPk === true,
        });
        columnsByTable.set(table, columns);
      }

      const missing = tables.filter((table) => !columnsByTable.has(table));
      if (missing.length > 0) {
        throw new ConfigError(`Tables not found in database: ${missing.join(', ')}`);
      }

      const tableInfos: TableInfo[] = [];
      for (const table of tables) {
        const sample = await client.query({
          text: `SELECT * FROM ${quoteIdent(table)} LIMIT ${SAFE_DEFAULTS.sampleRows}`,
          rowMode: 'array',
        });
        const sampleRows: unknown[][] = sample.rows;
        tableInfos.push({
          name: table,
          columns: columnsByTable.get(table) ?? [],
          sampleRows,
        });
      }

      return { tables: tableInfos, capturedAt: new Date() };
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
