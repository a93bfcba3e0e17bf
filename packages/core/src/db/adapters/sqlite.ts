/**
 * SQLite engine backed by better-sqlite3.
 *
 * Every acquisition opens its own read-only handle on the database file and
 * closes it on release, so concurrent callers never share a handle.
 */

import Database from 'better-sqlite3';
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

export interface SqliteConnectionConfig {
  filepath: string;
}

interface PragmaColumn {
  name: string;
  type: string;
  notnull: 0 | 1;
  pk: number;
}

/** Integers come back as bigint; narrow the ones a JS number holds exactly */
function toValue(value: unknown): unknown {
  if (typeof value === 'bigint' && Number.isSafeInteger(Number(value))) {
    return Number(value);
  }
  return value;
}

function toTuples(rows: unknown[]): unknown[][] {
  return rows.map((row) => (Array.isArray(row) ? row.map(toValue) : [toValue(row)]));
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

class SqliteConnection implements DbConnection {
  private released = false;

  constructor(private readonly db: Database.Database) {}

  async run(sql: string): Promise<RowSet> {
    const stmt = this.db.prepare(sql);
    if (!stmt.reader) {
      stmt.run();
      return { columns: [], rows: [] };
    }
    const columns = stmt.columns().map((column) => column.name);
    const rows = toTuples(stmt.safeIntegers(true).raw(true).all());
    return { columns, rows };
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.db.close();
  }
}

export class SqliteEngine implements DbEngine {
  readonly type = 'sqlite' as const;
  private readonly timeoutMs: number;

  constructor(
    private readonly cfg: SqliteConnectionConfig,
    limits: EngineLimits = {},
  ) {
    if (!cfg.filepath.trim()) {
      throw new ConfigError('SQLite database path is required.');
    }
    this.timeoutMs = limits.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;
  }

  private open(): Database.Database {
    return new Database(this.cfg.filepath, {
      readonly: true,
      fileMustExist: true,
      timeout: this.timeoutMs,
    });
  }

  async acquire(): Promise<DbConnection> {
    return new SqliteConnection(this.open());
  }

  async introspect(tables: readonly string[]): Promise<SchemaSnapshot> {
    const db = this.open();
    try {
      const existing = new Set(
        db
          .prepare<[], { name: string }>(
            "SELECT name FROM sqlite_master WHERE type IN ('table', 'view')",
          )
          .all()
          .map((row) => row.name),
      );
      const missing = tables.filter((table) => !existing.has(table));
      if (missing.length > 0) {
        throw new ConfigError(`Tables not found in database: ${missing.join(', ')}`);
      }

      const tableInfos: TableInfo[] = tables.map((tableName) => {
        const columns = db
          .prepare<[], PragmaColumn>(`PRAGMA table_info(${quoteIdent(tableName)})`)
          .all();
        const sampleRows = db
          .prepare(`SELECT * FROM ${quoteIdent(tableName)} LIMIT ${SAFE_DEFAULTS.sampleRows}`)
          .safeIntegers(true)
          .raw(true)
          .all();

        return {
          name: tableName,
          columns: columns.map(
            (column): ColumnInfo => ({
              name: column.name,
              dataType: column.type || 'TEXT',
              nullable: column.notnull === 0,
              isPrimaryKey: column.pk > 0,
            }),
          ),
          sampleRows: toTuples(sampleRows),
        };
      });

      return { tables: tableInfos, capturedAt: new Date() };
    } finally {
      db.close();
    }
  }

  async close(): Promise<void> {
    // Handles are closed on release; nothing is held between calls
  }
}
