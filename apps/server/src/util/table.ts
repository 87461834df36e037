/**
 * Minimal table formatter for CLI output.
 * Prints a simple ASCII table with column headers and rows.
 */

const MAX_WIDTH = 40;
const WIDE = /[\u1100-\u115F\u2E80-\uA4CF\uAC00-\uD7A3\uF900-\uFAFF\uFE30-\uFE4F\uFF00-\uFF60\uFFE0-\uFFE6]/;

export function formatTable(columns: string[], rows: Record<string, unknown>[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => Math.min(displayWidth(col), MAX_WIDTH));
  for (const row of rows) {
    columns.forEach((col, i) => {
      widths[i] = Math.min(Math.max(widths[i], displayWidth(formatValue(row[col]))), MAX_WIDTH);
    });
  }

  const lines = [
    columns.map((col, i) => fit(col, widths[i])).join(' | '),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
    ...rows.map((row) => columns.map((col, i) => fit(formatValue(row[col]), widths[i])).join(' | ')),
  ];

  return lines.join('\n');
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}

// CJK characters occupy two terminal cells.
export function displayWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    width += WIDE.test(ch) ? 2 : 1;
  }
  return width;
}

function fit(text: string, width: number): string {
  if (displayWidth(text) <= width) {
    return text + ' '.repeat(width - displayWidth(text));
  }
  let out = '';
  for (const ch of text) {
    if (displayWidth(out + ch) > width - 1) break;
    out += ch;
  }
  return out + '…' + ' '.repeat(Math.max(0, width - 1 - displayWidth(out)));
}
