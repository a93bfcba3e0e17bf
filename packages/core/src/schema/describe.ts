/**
 * Schema description used to prime the agent's instructions.
 * Built once at start-up from the allowlisted tables.
 */

import type { SchemaSnapshot, TableInfo } from '../db/types.js';

function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}

function describeTable(table: TableInfo): string[] {
  const lines: string[] = [`TABLE ${table.name}`];

  // Primary key columns first, then declaration order
  const cols = [...table.columns].sort((a, b) => Number(b.isPrimaryKey) - Number(a.isPrimaryKey));
  for (const col of cols) {
    const pk = col.isPrimaryKey ? ' PK' : '';
    const nullable = col.nullable ? ' NULL' : ' NOT NULL';
    lines.push(`  ${col.name} ${col.dataType}${nullable}${pk}`);
  }

  if (table.sampleRows.length > 0) {
    lines.push(`  /* ${table.sampleRows.length} rows from ${table.name}:`);
    lines.push(`  ${table.columns.map((c) => c.name).join('\t')}`);
    for (const row of table.sampleRows) {
      lines.push(`  ${row.map(formatValue).join('\t')}`);
    }
    lines.push('  */');
  }

  return lines;
}

export function describeSchema(schema: SchemaSnapshot): string {
  const lines: string[] = ['-- Database Schema', ''];
  for (const table of schema.tables) {
    lines.push(...describeTable(table), '');
  }
  return lines.join('\n');
}
