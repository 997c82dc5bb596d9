export { formatCellAddress, formatQualifiedAddress, formatSheetName } from "./a1.ts";
export { InMemoryCellStore } from "./cell-store.ts";
export type { CellStore, FindCellsQuery } from "./cell-store.ts";
export { compareCellPosition, createCellRecord, normalizeCellText } from "./cells.ts";
export { FileDescriptorSchema, SheetDescriptorSchema } from "./descriptor-schema.ts";
export { IngestError } from "./errors.ts";
export type { IngestCoordinate, IngestErrorCode } from "./errors.ts";
export { buildFileDescriptor, cellsFromGrid, describeSheet } from "./grid.ts";
export type { GridValue } from "./grid.ts";
export { DEFAULT_CURRENCY_PREFIXES, parseSpreadsheetNumber } from "./number-parsing.ts";
export type { NumberParseOptions } from "./number-parsing.ts";
export {
  allOf,
  anyCell,
  anyOf,
  createTermMatcher,
  isKind,
  satisfiesAll,
  satisfiesComparison,
  textContainsAny,
} from "./predicates.ts";
export type { CellPredicate, ComparisonOperator, NumericComparison } from "./predicates.ts";
export type { CellInput, CellKind, CellRecord, CellStoreStats, FileDescriptor, SheetDescriptor } from "./types.ts";
