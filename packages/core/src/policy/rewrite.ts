/**
 * Bounding rewrite for sqlgate.
 *
 * Unbounded SELECTs get a LIMIT appended to the original text. Aggregate and
 * grouped queries are left alone: they return few rows by construction.
 * A trailing `--` comment swallows the appended LIMIT (see rules.ts).
 */

const LIMIT_RE = /(?<![\p{L}\p{N}\p{M}_])limit\s+\d+(?![\p{L}\p{N}\p{M}_])/iu;
const AGGREGATE_RE =
  /(?<![\p{L}\p{N}\p{M}_])(?:count\(|group\s+by(?![\p{L}\p{N}\p{M}_])|sum\(|avg\(|max\(|min\()/iu;

/** True when the statement already carries `LIMIT <n>` */
export function hasRowLimit(sql: string): boolean {
  return LIMIT_RE.test(sql);
}

/** True when the statement aggregates or groups its rows */
export function hasAggregate(sql: string): boolean {
  return AGGREGATE_RE.test(sql);
}

/**
 * Append ` LIMIT <defaultLimit>` unless the statement is already bounded.
 *
 * @param sql  Normalized SELECT (trimmed, no trailing terminator)
 */
export function ensureLimit(
  sql: string,
  defaultLimit: number,
): { rewrittenSql: string; limitApplied: boolean } {
  if (hasRowLimit(sql) || hasAggregate(sql)) {
    return { rewrittenSql: sql, limitApplied: false };
  }
  return { rewrittenSql: `${sql} LIMIT ${defaultLimit}`, limitApplied: true };
}
