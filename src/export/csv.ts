export type CellValue = string | number | boolean | null | undefined;

/**
 * One output row, keyed by column name
 */
export type TableRow = Readonly<Record<string, CellValue>>;

const NEEDS_QUOTING = /[",\r\n]/;

export function formatCell(value: CellValue): string {
  if (value === undefined || value === null) {
    return '';
  }
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Render a header line plus one line per row, in the given column order.
 * Keys a row has outside `columns` are not written.
 */
export function formatTable(columns: readonly string[], rows: readonly TableRow[]): string {
  const lines = [columns.map(formatCell).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => formatCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}
