export type CellKind = "text" | "numeric" | "empty";

/**
 * One ingested spreadsheet cell.
 *
 * Rows and columns are 1-based, matching A1 notation (`row: 1, column: 1` is `A1`).
 * Records are frozen by {@link createCellRecord} and never mutated afterwards.
 */
export interface CellRecord {
  readonly fileId: string;
  readonly sheetName: string;
  readonly row: number;
  readonly column: number;
  /** Derived from `(row, column)`, e.g. `B3`. */
  readonly address: string;
  readonly rawText: string;
  /** Lower-cased, trimmed `rawText` with inner whitespace collapsed. */
  readonly normalizedText: string;
  /** Present only when the cell parses as a number. */
  readonly numericValue?: number;
  readonly kind: CellKind;
}

/**
 * What the upstream parser hands over per cell. `address`, `normalizedText`,
 * `numericValue` and `kind` are derived.
 */
export interface CellInput {
  fileId: string;
  sheetName: string;
  row: number;
  column: number;
  value: string | number | boolean | null | undefined;
}

export interface SheetDescriptor {
  readonly fileId: string;
  readonly name: string;
  readonly rowCount: number;
  readonly columnCount: number;
  readonly cellCount: number;
}

export interface FileDescriptor {
  readonly fileId: string;
  readonly displayName: string;
  /** ISO-8601 timestamp. */
  readonly ingestedAt: string;
  readonly sheets: readonly SheetDescriptor[];
}

export interface CellStoreStats {
  fileCount: number;
  sheetCount: number;
  cellCount: number;
  numericCellCount: number;
  textCellCount: number;
}
