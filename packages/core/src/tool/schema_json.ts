/**
 * JSON Schema for the `execute_sql` tool arguments.
 * Doubles as the tool's `parameters` block and the AJV validation schema.
 */

import type { JSONSchemaType } from 'ajv';

export interface QueryInput {
  /** A single read-only SELECT statement */
  readonly sql: string;
}

export const queryInputSchema: JSONSchemaType<QueryInput> = {
  type: 'object',
  properties: {
    sql: {
      type: 'string',
      minLength: 1,
      description: 'A single read-only SELECT statement, bounded with LIMIT when returning many rows.',
    },
  },
  required: ['sql'],
  additionalProperties: false,
};
