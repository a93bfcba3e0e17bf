/**
 * Database abstraction types for sqlgate.
 * Each supported engine (SQLite, Postgres) implements DbEngine.
 */

export type DbType = 'postgres' | 'sqlite';

/** Column names and positional row tuples, in the order the database returned them */
export interface RowSet {
  columns: string[];
  rows: unknown[][];
}

export interface RowsResult extends RowSet {
  kind: 'rows';
}

export interface ExecutionErrorResult {
  kind: 'error';
  /** Diagnostic text from the underlying failure */
  message: string;
}

export type QueryResult = RowsResult | ExecutionErrorResult;

export interface EngineLimits {
  /** Statement timeout in milliseconds (busy timeout for SQLite) */
  statementTimeoutMs?: number;
  /** Maximum pooled connections */
  poolMax?: number;
  /** Connection acquisition timeout in milliseconds */
  connectionTimeoutMs?: number;
}

export interface SchemaSnapshot {
  tables: TableInfo[];
  capturedAt: Date;
}

export interface TableInfo {
  name: string;
  columns: ColumnInfo[];
  /** A few rows to show what the data looks like */
  sampleRows: unknown[][];
}

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
}

/**
 * A connection checked out for one execution. Used by a single caller and
 * released exactly once.
 */
export interface DbConnection {
  run(sql: string): Promise<RowSet>;
  /** Return the connection; pass the failure so a broken connection is discarded */
  release(error?: Error): void;
}

/**
 * Process-lifetime connection source. Safe for concurrent `acquire` calls:
 * every caller gets its own connection.
 */
export interface DbEngine {
  readonly type: DbType;

  acquire(): Promise<DbConnection>;

  /** Describe the given tables, in the order given */
  introspect(tables: readonly string[]): Promise<SchemaSnapshot>;

  close(): Promise<void>;
}
