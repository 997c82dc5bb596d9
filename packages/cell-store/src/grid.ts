import { createCellRecord } from "./cells.ts";
import type { CellInput, CellRecord, FileDescriptor, SheetDescriptor } from "./types.ts";

export type GridValue = CellInput["value"];

/**
 * Convert a 2-D array of values (row-major, `rows[0][0]` is `A1`) into cell
 * records. Blank values are skipped.
 */
export function cellsFromGrid(fileId: string, sheetName: string, rows: readonly (readonly GridValue[])[]): CellRecord[] {
  const cells: CellRecord[] = [];
  rows.forEach((values, rowIndex) => {
    values.forEach((value, columnIndex) => {
      const record = createCellRecord({ fileId, sheetName, row: rowIndex + 1, column: columnIndex + 1, value });
      if (record.kind !== "empty") cells.push(record);
    });
  });
  return cells;
}

export function describeSheet(fileId: string, name: string, cells: readonly CellRecord[]): SheetDescriptor {
  let rowCount = 0;
  let columnCount = 0;
  let cellCount = 0;
  for (const cell of cells) {
    if (cell.kind === "empty") continue;
    cellCount += 1;
    if (cell.row > rowCount) rowCount = cell.row;
    if (cell.column > columnCount) columnCount = cell.column;
  }
  return { fileId, name, rowCount, columnCount, cellCount };
}

/**
 * Build a descriptor whose dimensions are derived from the sheets' cells.
 */
export function buildFileDescriptor(
  fileId: string,
  displayName: string,
  sheets: ReadonlyArray<{ name: string; cells: readonly CellRecord[] }>,
  ingestedAt: string = new Date().toISOString(),
): FileDescriptor {
  return {
    fileId,
    displayName,
    ingestedAt,
    sheets: sheets.map((sheet) => describeSheet(fileId, sheet.name, sheet.cells)),
  };
}
