import pino, { type Logger } from "pino";

import { formatCellAddress, formatQualifiedAddress } from "./a1.ts";
import { compareCellPosition } from "./cells.ts";
import { FileDescriptorSchema, describeZodIssues } from "./descriptor-schema.ts";
import { IngestError, type IngestCoordinate } from "./errors.ts";
import { anyCell, type CellPredicate } from "./predicates.ts";
import type { CellRecord, CellStoreStats, FileDescriptor, SheetDescriptor } from "./types.ts";

export interface FindCellsQuery {
  /** Restrict to one file. All files are searched when omitted. */
  fileId?: string;
  /** Restrict to one sheet (of every searched file). */
  sheetName?: string;
  predicate?: CellPredicate;
}

export interface CellStore {
  ingest(descriptor: FileDescriptor, cells: Iterable<CellRecord>): string;
  getSheets(fileId?: string): SheetDescriptor[];
  /**
   * Lazily yield matching cells in row-major order per sheet, sheets in
   * descriptor order, files in ingestion order. Unknown files/sheets yield nothing.
   */
  findCells(query?: FindCellsQuery): Iterable<CellRecord>;
  listFiles(): FileDescriptor[];
  getFile(fileId: string): FileDescriptor | undefined;
  removeFile(fileId: string): boolean;
  stats(): CellStoreStats;
}

interface FileSnapshot {
  readonly descriptor: FileDescriptor;
  readonly cellsBySheet: ReadonlyMap<string, readonly CellRecord[]>;
}

function cellKey(sheetName: string, row: number, column: number): string {
  return `${sheetName}\u0000${row}:${column}`;
}

function coordinateOf(cell: CellRecord): IngestCoordinate {
  const valid = Number.isInteger(cell.row) && cell.row > 0 && Number.isInteger(cell.column) && cell.column > 0;
  return {
    fileId: cell.fileId,
    sheetName: cell.sheetName,
    row: cell.row,
    column: cell.column,
    ...(valid ? { address: formatQualifiedAddress(cell.sheetName, cell.row, cell.column) } : {}),
  };
}

function freezeDescriptor(descriptor: FileDescriptor): FileDescriptor {
  return Object.freeze({
    fileId: descriptor.fileId,
    displayName: descriptor.displayName,
    ingestedAt: descriptor.ingestedAt,
    sheets: Object.freeze(descriptor.sheets.map((sheet) => Object.freeze({ ...sheet }))),
  });
}

/**
 * In-memory cell store. Each ingestion builds a complete snapshot for the file
 * and swaps it in with a single map assignment, so readers see either the old
 * or the new version of a file, never a mix.
 */
export class InMemoryCellStore implements CellStore {
  private readonly files = new Map<string, FileSnapshot>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  ingest(descriptor: FileDescriptor, cells: Iterable<CellRecord>): string {
    try {
      const snapshot = this.buildSnapshot(descriptor, cells);
      const replaced = this.files.has(snapshot.descriptor.fileId);
      this.files.set(snapshot.descriptor.fileId, snapshot);

      let cellCount = 0;
      for (const sheetCells of snapshot.cellsBySheet.values()) cellCount += sheetCells.length;
      this.logger.info(
        { fileId: snapshot.descriptor.fileId, sheetCount: snapshot.descriptor.sheets.length, cellCount, replaced },
        "ingested file",
      );
      return snapshot.descriptor.fileId;
    } catch (err) {
      if (err instanceof IngestError) {
        this.logger.warn({ code: err.code, coordinate: err.coordinate }, "rejected ingestion");
      }
      throw err;
    }
  }

  getSheets(fileId?: string): SheetDescriptor[] {
    return this.snapshots(fileId).flatMap((snapshot) => [...snapshot.descriptor.sheets]);
  }

  findCells(query: FindCellsQuery = {}): Iterable<CellRecord> {
    // Resolve snapshots now so a later swap can't leak into an in-flight iteration.
    const snapshots = this.snapshots(query.fileId);
    const predicate = query.predicate ?? anyCell;
    const sheetName = query.sheetName;

    function* iterate(): Generator<CellRecord> {
      for (const snapshot of snapshots) {
        for (const sheet of snapshot.descriptor.sheets) {
          if (sheetName !== undefined && sheet.name !== sheetName) continue;
          for (const cell of snapshot.cellsBySheet.get(sheet.name) ?? []) {
            if (predicate(cell)) yield cell;
          }
        }
      }
    }

    return iterate();
  }

  listFiles(): FileDescriptor[] {
    return [...this.files.values()].map((snapshot) => snapshot.descriptor);
  }

  getFile(fileId: string): FileDescriptor | undefined {
    return this.files.get(fileId)?.descriptor;
  }

  removeFile(fileId: string): boolean {
    const removed = this.files.delete(fileId);
    if (removed) this.logger.info({ fileId }, "removed file");
    return removed;
  }

  stats(): CellStoreStats {
    const stats: CellStoreStats = { fileCount: 0, sheetCount: 0, cellCount: 0, numericCellCount: 0, textCellCount: 0 };
    for (const snapshot of this.files.values()) {
      stats.fileCount += 1;
      stats.sheetCount += snapshot.descriptor.sheets.length;
      for (const sheetCells of snapshot.cellsBySheet.values()) {
        for (const cell of sheetCells) {
          stats.cellCount += 1;
          if (cell.kind === "numeric") stats.numericCellCount += 1;
          else if (cell.kind === "text") stats.textCellCount += 1;
        }
      }
    }
    return stats;
  }

  private snapshots(fileId: string | undefined): FileSnapshot[] {
    if (fileId === undefined) return [...this.files.values()];
    const snapshot = this.files.get(fileId);
    return snapshot ? [snapshot] : [];
  }

  private buildSnapshot(descriptor: FileDescriptor, cells: Iterable<CellRecord>): FileSnapshot {
    const parsed = FileDescriptorSchema.safeParse(descriptor);
    if (!parsed.success) {
      throw new IngestError(`Invalid file descriptor: ${describeZodIssues(parsed.error)}`, {
        code: "invalid_descriptor",
      });
    }

    const frozen = freezeDescriptor(descriptor);
    const sheetNames = new Set(frozen.sheets.map((sheet) => sheet.name));
    const cellsBySheet = new Map<string, CellRecord[]>();
    for (const name of sheetNames) cellsBySheet.set(name, []);
    const seen = new Set<string>();

    for (const cell of cells) {
      if (cell.fileId !== frozen.fileId) {
        throw new IngestError(`Cell belongs to file "${cell.fileId}", expected "${frozen.fileId}"`, {
          code: "file_mismatch",
          coordinate: coordinateOf(cell),
        });
      }

      const sheetCells = cellsBySheet.get(cell.sheetName);
      if (!sheetCells) {
        throw new IngestError(`Cell references sheet "${cell.sheetName}" missing from the descriptor`, {
          code: "unknown_sheet",
          coordinate: coordinateOf(cell),
        });
      }

      const coordinate = coordinateOf(cell);
      if (coordinate.address === undefined || cell.address !== formatCellAddress(cell.row, cell.column)) {
        throw new IngestError(
          `Invalid cell coordinate row=${cell.row} column=${cell.column} address="${cell.address}"`,
          { code: "invalid_cell", coordinate },
        );
      }

      const key = cellKey(cell.sheetName, cell.row, cell.column);
      if (seen.has(key)) {
        throw new IngestError(`Duplicate cell ${coordinate.address} in file "${frozen.fileId}"`, {
          code: "duplicate_cell",
          coordinate,
        });
      }
      seen.add(key);
      sheetCells.push(Object.isFrozen(cell) ? cell : Object.freeze({ ...cell }));
    }

    for (const sheetCells of cellsBySheet.values()) sheetCells.sort(compareCellPosition);
    return { descriptor: frozen, cellsBySheet };
  }
}
