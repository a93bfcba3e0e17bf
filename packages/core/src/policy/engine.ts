/**
 * Admission filter: decides whether a candidate query may run.
 *
 * `admit` is pure and total: every input maps to a verdict, nothing throws.
 * Refusals are ordinary values the calling agent can reason about and retry.
 */

import {
  type AdmissionConfig,
  type AdmissionVerdict,
  REJECTION_MESSAGES,
  defaultAdmissionConfig,
} from './types.js';
import { findViolation, normalizeStatement } from './rules.js';
import { ensureLimit } from './rewrite.js';

export function admit(
  text: string,
  config: AdmissionConfig = defaultAdmissionConfig(),
): AdmissionVerdict {
  const sql = normalizeStatement(text);

  const violation = findViolation(sql);
  if (violation) {
    return {
      status: 'rejected',
      reason: violation.reason,
      message: REJECTION_MESSAGES[violation.reason],
      suggestedFix: violation.suggestedFix,
    };
  }

  if (!config.enforceLimit) {
    return { status: 'accepted', finalText: sql, limitApplied: false };
  }

  const rewrite = ensureLimit(sql, config.defaultLimit);
  return {
    status: 'accepted',
    finalText: rewrite.rewrittenSql,
    limitApplied: rewrite.limitApplied,
  };
}

/**
 * Admission filter bound to a mutable config, for callers that tune the
 * LIMIT per session.
 */
export class AdmissionPolicy {
  private config: AdmissionConfig;

  constructor(config?: Partial<AdmissionConfig>) {
    this.config = { ...defaultAdmissionConfig(), ...config };
  }

  admit(text: string): AdmissionVerdict {
    return admit(text, this.config);
  }

  getConfig(): AdmissionConfig {
    return { ...this.config };
  }

  setConfig(config: Partial<AdmissionConfig>): void {
    this.config = { ...this.config, ...config };
  }
}
