/**
 * Minimal table formatter for CLI output.
 * Prints a simple ASCII table from column names and positional rows.
 */

const MAX_WIDTH = 60;

export function formatTable(columns: string[], rows: unknown[][]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const cells = rows.map((row) => columns.map((_, i) => formatValue(row[i])));

  const widths = columns.map((col) => Math.min(col.length, MAX_WIDTH));
  for (const row of cells) {
    row.forEach((val, i) => {
      widths[i] = Math.min(Math.max(widths[i], val.length), MAX_WIDTH);
    });
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => fit(col, widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));
  for (const row of cells) {
    lines.push(row.map((val, i) => fit(val, widths[i])).join(' | '));
  }
  lines.push(`(${rows.length} ${rows.length === 1 ? 'row' : 'rows'})`);

  return lines.join('\n');
}

function fit(val: string, width: number): string {
  return val.length > width ? val.slice(0, width - 1) + '…' : val.padEnd(width);
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'bigint') return val.toString();
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
