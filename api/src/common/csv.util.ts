/** Prepended so spreadsheet apps open the file as UTF-8 */
export const UTF8_BOM = '\uFEFF';

/**
 * Quote a CSV field when it contains a delimiter, a quote or a line break.
 * Embedded quotes are doubled.
 */
export function escapeCsv(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';

  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/** RFC 4180 lines (CRLF), header first, with a trailing line break */
export function toCsv(
  headers: readonly string[],
  rows: ReadonlyArray<ReadonlyArray<string | number | null>>,
): string {
  const lines: ReadonlyArray<ReadonlyArray<string | number | null>> = [
    headers,
    ...rows,
  ];
  return lines.map((row) => row.map(escapeCsv).join(',') + '\r\n').join('');
}
