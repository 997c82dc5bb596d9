function columnIndexToLabel(index: number): string {
  if (!Number.isInteger(index) || index <= 0) {
    throw new Error(`Invalid column index: ${index}`);
  }

  let value = index;
  let label = "";
  while (value > 0) {
    const remainder = (value - 1) % 26;
    label = String.fromCharCode(65 + remainder) + label;
    value = Math.floor((value - 1) / 26);
  }

  return label;
}

/**
 * Encode a 1-based row and column as an A1 address (`(3, 2) -> "B3"`).
 */
export function formatCellAddress(row: number, column: number): string {
  if (!Number.isInteger(row) || row <= 0) {
    throw new Error(`Invalid row number: ${row}`);
  }
  return `${columnIndexToLabel(column)}${row}`;
}

function isPlainSheetName(name: string): boolean {
  if (!/^[A-Za-z_][A-Za-z0-9_.]*$/.test(name)) return false;
  const lower = name.toLowerCase();
  if (lower === "true" || lower === "false") return false;
  // Names like `A1` or `R1C1` would read as cell references.
  if (/^[A-Za-z]{1,3}\d+$/.test(name)) return false;
  if (/^r\d*c\d*$/i.test(name)) return false;
  return true;
}

/**
 * Excel style: quote sheet names containing spaces/special characters
 * using single quotes and escaping embedded quotes via doubling.
 */
export function formatSheetName(sheetName: string): string {
  if (isPlainSheetName(sheetName)) return sheetName;
  return `'${sheetName.replace(/'/g, "''")}'`;
}

export function formatQualifiedAddress(sheetName: string, row: number, column: number): string {
  return `${formatSheetName(sheetName)}!${formatCellAddress(row, column)}`;
}
