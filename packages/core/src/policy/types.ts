/**
 * Admission types for sqlgate.
 *
 * Every candidate query is admitted or rejected before it can reach the
 * database. A verdict is produced exactly once per candidate and never
 * changes afterwards.
 */

/** Why a candidate query was refused */
export type RejectionReason =
  | 'write_operation_forbidden'
  | 'multiple_statements_forbidden'
  | 'only_select_allowed';

export interface AcceptedVerdict {
  readonly status: 'accepted';
  /** Text to execute, with the bounding LIMIT appended when it was needed */
  readonly finalText: string;
  /** Whether the default LIMIT was appended */
  readonly limitApplied: boolean;
}

export interface RejectedVerdict {
  readonly status: 'rejected';
  readonly reason: RejectionReason;
  /** Message handed back to the agent verbatim */
  readonly message: string;
  readonly suggestedFix: string;
}

export type AdmissionVerdict = AcceptedVerdict | RejectedVerdict;

/** Admission settings */
export interface AdmissionConfig {
  /** Append a LIMIT to unbounded, non-aggregate SELECTs. Default: true */
  enforceLimit: boolean;
  /** LIMIT appended when none is present. Default: 200 */
  defaultLimit: number;
}

export const REJECTION_MESSAGES: Readonly<Record<RejectionReason, string>> = {
  write_operation_forbidden: 'ERROR: write operations are not allowed.',
  multiple_statements_forbidden: 'ERROR: multiple statements are not allowed.',
  only_select_allowed: 'ERROR: only SELECT statements are allowed.',
};

/** Default admission config */
export function defaultAdmissionConfig(): AdmissionConfig {
  return {
    enforceLimit: true,
    defaultLimit: 200,
  };
}
