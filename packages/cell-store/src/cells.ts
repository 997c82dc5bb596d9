import { formatCellAddress } from "./a1.ts";
import { parseSpreadsheetNumber } from "./number-parsing.ts";
import type { CellInput, CellKind, CellRecord } from "./types.ts";

export function normalizeCellText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, " ");
}

function toRawText(value: CellInput["value"]): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
  return String(value);
}

export function createCellRecord(input: CellInput): CellRecord {
  const rawText = toRawText(input.value);
  const normalizedText = normalizeCellText(rawText);
  const numericValue =
    typeof input.value === "boolean" || normalizedText === "" ? null : parseSpreadsheetNumber(input.value);

  let kind: CellKind = "text";
  if (normalizedText === "") kind = "empty";
  else if (numericValue !== null) kind = "numeric";

  const record: CellRecord = {
    fileId: input.fileId,
    sheetName: input.sheetName,
    row: input.row,
    column: input.column,
    address: formatCellAddress(input.row, input.column),
    rawText,
    normalizedText,
    kind,
    ...(numericValue !== null ? { numericValue } : {}),
  };
  return Object.freeze(record);
}

/** Row-major comparison: row first, then column. */
export function compareCellPosition(a: Pick<CellRecord, "row" | "column">, b: Pick<CellRecord, "row" | "column">): number {
  return a.row - b.row || a.column - b.column;
}
