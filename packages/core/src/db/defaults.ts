/**
 * Safe defaults for admission and execution.
 */

export const SAFE_DEFAULTS = {
  /** LIMIT appended to unbounded queries */
  defaultLimit: 200,
  /** Statement timeout in milliseconds */
  statementTimeoutMs: 15_000,
  /** Maximum pooled connections */
  poolMax: 10,
  /** Connection acquisition timeout in milliseconds */
  connectionTimeoutMs: 10_000,
  /** Rows shown per table in schema descriptions */
  sampleRows: 3,
} as const;
