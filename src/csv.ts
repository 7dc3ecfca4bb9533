const NEEDS_QUOTES = /[",\r\n]/;

const quoteCell = (cell: string): string =>
  NEEDS_QUOTES.test(cell) ? `"${cell.replace(/"/g, "\"\"")}"` : cell;

export const toCsv = (rows: readonly (readonly string[])[]): string =>
  rows.map((row) => row.map(quoteCell).join(",")).join("\n") + "\n";
