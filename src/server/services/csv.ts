/**
 * RFC 4180 CSV serialization, built in memory.
 */

export interface CsvColumn<T> {
  header: string;
  value: (row: T) => string | number;
}

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string | number): string {
  const text = String(value);
  if (!NEEDS_QUOTING.test(text)) return text;
  return `"${text.replace(/"/g, '""')}"`;
}

export function toCsv<T>(columns: readonly CsvColumn<T>[], rows: Iterable<T>): string {
  const lines = [columns.map((column) => escapeCsvField(column.header)).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvField(column.value(row))).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}
