export type IngestErrorCode = "duplicate_cell" | "invalid_descriptor" | "invalid_cell" | "unknown_sheet" | "file_mismatch";

export interface IngestCoordinate {
  fileId: string;
  sheetName: string;
  row: number;
  column: number;
  /** Sheet-qualified A1 address when the coordinate is valid, e.g. `Sheet1!B3`. */
  address?: string;
}

/**
 * Raised when an ingestion is rejected. The store keeps its previous contents.
 */
export class IngestError extends Error {
  readonly code: IngestErrorCode;
  readonly coordinate?: IngestCoordinate;

  constructor(message: string, opts: { code: IngestErrorCode; coordinate?: IngestCoordinate }) {
    super(message);
    this.name = "IngestError";
    this.code = opts.code;
    this.coordinate = opts.coordinate;
  }
}
