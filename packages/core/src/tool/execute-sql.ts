/**
 * `execute_sql`: the guardrail exposed as a function tool for an agent loop.
 *
 * Arguments arrive as a JSON string, a bare SQL string or an already-decoded
 * object and are validated with AJV before admission. `invoke` always resolves to an
 * observation; it never throws.
 */

import AjvModule from 'ajv';
import { type QueryInput, queryInputSchema } from './schema_json.js';
import { runGuardedQuery, toObservation, type Observation } from '../guard.js';
import { type AdmissionConfig, defaultAdmissionConfig } from '../policy/types.js';
import type { DbEngine } from '../db/types.js';

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true });
const validateQueryInput = ajv.compile(queryInputSchema);

export const EXECUTE_SQL_TOOL = {
  name: 'execute_sql',
  description: 'Execute exactly one SELECT statement; DML/DDL is forbidden.',
  parameters: queryInputSchema,
} as const;

export type QueryInputOutcome = { ok: true; input: QueryInput } | { ok: false; error: string };

/**
 * Validate tool arguments structurally. The returned input is frozen.
 */
export function parseQueryInput(raw: unknown): QueryInputOutcome {
  let parsed: unknown = raw;
  if (typeof raw === 'string' && !raw.trimStart().startsWith('{')) {
    // Single-field tool: a bare string is the statement itself
    parsed = { sql: raw };
  } else if (typeof raw === 'string') {
    try {
      parsed = JSON.parse(raw);
    } catch {
      return { ok: false, error: `arguments are not valid JSON: ${raw.slice(0, 100)}` };
    }
  }

  if (validateQueryInput(parsed)) {
    return { ok: true, input: Object.freeze({ sql: parsed.sql }) };
  }

  const errors = validateQueryInput.errors
    ?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
    .join('; ');
  return { ok: false, error: errors ?? 'unknown validation error' };
}

export interface ExecuteSqlTool {
  definition: typeof EXECUTE_SQL_TOOL;
  invoke(args: unknown): Promise<Observation>;
}

export function createExecuteSqlTool(
  engine: DbEngine,
  config: AdmissionConfig = defaultAdmissionConfig(),
): ExecuteSqlTool {
  return {
    definition: EXECUTE_SQL_TOOL,
    async invoke(args: unknown): Promise<Observation> {
      const input = parseQueryInput(args);
      if (!input.ok) {
        return `ERROR: invalid tool arguments: ${input.error}`;
      }
      const outcome = await runGuardedQuery(engine, input.input.sql, config);
      return toObservation(outcome);
    },
  };
}
