function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** Render rows as CSV: a header of column names, then one line per row */
export function dumpCsv<T>(rows: readonly T[], columns: readonly (keyof T & string)[]): string {
  let csvContent = `${columns.join(",")}\n`;
  for (const row of rows) {
    csvContent += `${columns.map((c) => formatCell(row[c])).join(",")}\n`;
  }
  return csvContent;
}
