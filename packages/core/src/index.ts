/**
 * @sqlgate/core: barrel export
 *
 * Query admission and execution shared by the CLI and agent integrations.
 */

// Admission types
export type {
  RejectionReason,
  AcceptedVerdict,
  RejectedVerdict,
  AdmissionVerdict,
  AdmissionConfig,
} from './policy/types.js';
export { REJECTION_MESSAGES, defaultAdmissionConfig } from './policy/types.js';

// Admission filter
export { admit, AdmissionPolicy } from './policy/engine.js';
export { ADMISSION_RULES, normalizeStatement, findViolation } from './policy/rules.js';
export type { AdmissionRule } from './policy/rules.js';
export { ensureLimit, hasRowLimit, hasAggregate } from './policy/rewrite.js';

// Database types
export type {
  DbType,
  RowSet,
  RowsResult,
  ExecutionErrorResult,
  QueryResult,
  EngineLimits,
  SchemaSnapshot,
  TableInfo,
  ColumnInfo,
  DbConnection,
  DbEngine,
} from './db/types.js';
export { SAFE_DEFAULTS } from './db/defaults.js';

// Engines and execution
export { parseDatabaseUrl } from './db/url.js';
export type { DatabaseTarget } from './db/url.js';
export { createEngine } from './db/engine.js';
export { SqliteEngine } from './db/adapters/sqlite.js';
export type { SqliteConnectionConfig } from './db/adapters/sqlite.js';
export { PostgresEngine } from './db/adapters/postgres.js';
export type { PgConnectionConfig, PgSession, PgPoolLike } from './db/adapters/postgres.js';
export { executeQuery } from './db/execute.js';

// Guarded run
export { runGuardedQuery, toObservation } from './guard.js';
export type { GuardOutcome, Observation } from './guard.js';

// Agent tool binding
export {
  EXECUTE_SQL_TOOL,
  parseQueryInput,
  createExecuteSqlTool,
} from './tool/execute-sql.js';
export type { ExecuteSqlTool, QueryInputOutcome } from './tool/execute-sql.js';
export { queryInputSchema } from './tool/schema_json.js';
export type { QueryInput } from './tool/schema_json.js';

// Schema description
export { describeSchema } from './schema/describe.js';

// Configuration and errors
export { loadConfig, parseTableList, DEFAULT_DATABASE_URL, DEFAULT_TABLES } from './config.js';
export type { GuardrailConfig } from './config.js';
export { ConfigError, errorMessage } from './errors.js';
