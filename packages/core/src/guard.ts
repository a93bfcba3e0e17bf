/**
 * Guarded run: admission, then execution.
 *
 * One call per candidate query. A refused candidate never reaches the
 * engine; an admitted one is executed exactly once.
 */

import { admit } from './policy/engine.js';
import {
  type AcceptedVerdict,
  type AdmissionConfig,
  type RejectedVerdict,
  defaultAdmissionConfig,
} from './policy/types.js';
import { executeQuery } from './db/execute.js';
import type { DbEngine, ExecutionErrorResult, RowsResult } from './db/types.js';

export type GuardOutcome =
  | { status: 'rejected'; verdict: RejectedVerdict }
  | { status: 'ok'; verdict: AcceptedVerdict; result: RowsResult; execMs: number }
  | { status: 'error'; verdict: AcceptedVerdict; result: ExecutionErrorResult; execMs: number };

/** What the agent loop receives back for one tool call */
export type Observation = string | { columns: string[]; rows: unknown[][] };

export async function runGuardedQuery(
  engine: DbEngine,
  candidate: string,
  config: AdmissionConfig = defaultAdmissionConfig(),
): Promise<GuardOutcome> {
  const verdict = admit(candidate, config);
  if (verdict.status === 'rejected') {
    return { status: 'rejected', verdict };
  }

  const start = performance.now();
  const result = await executeQuery(engine, verdict.finalText);
  const execMs = Math.round(performance.now() - start);

  if (result.kind === 'error') {
    return { status: 'error', verdict, result, execMs };
  }
  return { status: 'ok', verdict, result, execMs };
}

/**
 * Render an outcome the way the agent sees it: the row payload on success,
 * an `ERROR: ...` line otherwise.
 */
export function toObservation(outcome: GuardOutcome): Observation {
  switch (outcome.status) {
    case 'rejected':
      return outcome.verdict.message;
    case 'error':
      return `ERROR: ${outcome.result.message}`;
    case 'ok':
      return { columns: outcome.result.columns, rows: outcome.result.rows };
  }
}
