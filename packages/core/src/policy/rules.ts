/**
 * Keyword rules for the sqlgate admission filter.
 *
 * Rules run in order against the normalized text and the first one that
 * matches decides the verdict. Keyword boundaries are Unicode-aware, so
 * `éupdate` is one identifier and not the keyword `update`.
 *
 * Known gaps of matching on raw text:
 * - occurrences inside string literals count too, so `WHERE name = 'update'`
 *   is refused;
 * - the bounding LIMIT is appended after everything, so a statement ending in
 *   a `--` line comment keeps the LIMIT inside the comment and runs unbounded.
 */

import type { RejectionReason } from './types.js';

export interface AdmissionRule {
  reason: RejectionReason;
  /** Returns true when the statement breaks the rule */
  violates(sql: string): boolean;
  suggestedFix: string;
}

const WRITE_KEYWORDS_RE =
  /(?<![\p{L}\p{N}\p{M}_])(INSERT|UPDATE|DELETE|DROP|TRUNCATE|ALTER|CREATE|REPLACE)(?![\p{L}\p{N}\p{M}_])/iu;
const SELECT_PREFIX_RE = /^\s*select(?![\p{L}\p{N}\p{M}_])/iu;
const STATEMENT_TERMINATOR = ';';

export const ADMISSION_RULES: readonly AdmissionRule[] = [
  {
    reason: 'write_operation_forbidden',
    violates: (sql) => WRITE_KEYWORDS_RE.test(sql),
    suggestedFix: 'Rewrite the request as a read-only SELECT.',
  },
  {
    reason: 'multiple_statements_forbidden',
    violates: (sql) => sql.includes(STATEMENT_TERMINATOR),
    suggestedFix: 'Send one statement per call.',
  },
  {
    reason: 'only_select_allowed',
    violates: (sql) => !SELECT_PREFIX_RE.test(sql),
    suggestedFix: 'Start the statement with SELECT.',
  },
];

/**
 * Trim the candidate and drop a single trailing terminator.
 */
export function normalizeStatement(sql: string): string {
  const trimmed = sql.trim();
  if (!trimmed.endsWith(STATEMENT_TERMINATOR)) return trimmed;
  return trimmed.slice(0, -STATEMENT_TERMINATOR.length).trimEnd();
}

/**
 * First rule the statement breaks, or null when it passes them all.
 */
export function findViolation(sql: string): AdmissionRule | null {
  return ADMISSION_RULES.find((rule) => rule.violates(sql)) ?? null;
}
