/**
 * Minimal CSV record writer.
 *
 * Fields are quoted only when they contain a delimiter, a quote or a line
 * break; quotes inside a quoted field are doubled.
 */

const NEEDS_QUOTES = /[",\r\n]/;

export function formatCsvField(field: string): string {
  if (!NEEDS_QUOTES.test(field)) {
    return field;
  }
  return `"${field.replace(/"/g, '""')}"`;
}

export class CsvWriter {
  private readonly lines: string[] = [];

  writeRecord(fields: readonly string[]): void {
    this.lines.push(fields.map(formatCsvField).join(',') + '\n');
  }

  toString(): string {
    return this.lines.join('');
  }
}
