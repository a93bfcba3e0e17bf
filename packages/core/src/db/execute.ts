/**
 * Execution adapter.
 *
 * Runs an admitted statement on a connection of its own and turns every
 * failure into an `ExecutionErrorResult`. The connection goes back to the
 * engine on every path. No retry: one failed attempt is one error.
 */

import { errorMessage } from '../errors.js';
import type { DbConnection, DbEngine, QueryResult } from './types.js';

/**
 * Execute `finalText`, which must come from an accepted admission verdict.
 * The text is not checked again here.
 */
export async function executeQuery(engine: DbEngine, finalText: string): Promise<QueryResult> {
  let connection: DbConnection;
  try {
    connection = await engine.acquire();
  } catch (err: unknown) {
    return { kind: 'error', message: errorMessage(err) };
  }

  let failure: Error | undefined;
  try {
    const { columns, rows } = await connection.run(finalText);
    return { kind: 'rows', columns, rows };
  } catch (err: unknown) {
    failure = err instanceof Error ? err : new Error(String(err));
    return { kind: 'error', message: failure.message };
  } finally {
    connection.release(failure);
  }
}
