import { ConfigError, type RejectedVerdict, type RejectionReason } from '@sqlgate/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_INVALID'
  | 'DB_QUERY_FAILED'
  | 'POLICY_BLOCKED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

/** Why admission refused the statement and how to rewrite it */
export interface Refusal {
  reason: RejectionReason;
  suggestedFix: string;
}

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  /** Set on policy errors */
  readonly refusal?: Refusal;
  /** Statement that was sent to the database, on query failures */
  readonly sql?: string;

  constructor(
    kind: CliErrorKind,
    code: CliErrorCode,
    message: string,
    extra: { refusal?: Refusal; sql?: string } = {},
  ) {
    super(message);
    this.name = 'CliError';
    this.kind = kind;
    this.code = code;
    this.refusal = extra.refusal;
    this.sql = extra.sql;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS'): CliError {
  return new CliError('usage', code, message);
}

/** A statement that was admitted but failed in the database */
export function queryError(message: string, sql: string): CliError {
  return new CliError('runtime', 'DB_QUERY_FAILED', message, { sql });
}

export function policyError(verdict: RejectedVerdict): CliError {
  return new CliError('policy', 'POLICY_BLOCKED', verdict.message, {
    refusal: { reason: verdict.reason, suggestedFix: verdict.suggestedFix },
  });
}

export function toExitCode(error: unknown): number {
  if (!(error instanceof CliError)) return EXIT_CODE_RUNTIME;
  switch (error.kind) {
    case 'usage':
      return EXIT_CODE_USAGE;
    case 'policy':
      return EXIT_CODE_POLICY;
    case 'runtime':
      return EXIT_CODE_RUNTIME;
  }
}

/**
 * Map core start-up faults onto CLI errors; anything else passes through.
 */
export function fromCoreError(error: unknown): unknown {
  if (error instanceof ConfigError) {
    return usageError(error.message, 'CONFIG_INVALID');
  }
  return error;
}
