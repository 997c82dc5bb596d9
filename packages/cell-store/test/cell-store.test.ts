import pino from "pino";
import { describe, expect, it } from "vitest";

import { InMemoryCellStore } from "../src/cell-store.ts";
import { createCellRecord } from "../src/cells.ts";
import { IngestError } from "../src/errors.ts";
import { buildFileDescriptor, cellsFromGrid } from "../src/grid.ts";
import { satisfiesAll } from "../src/predicates.ts";
import type { CellRecord, FileDescriptor } from "../src/types.ts";

const INGESTED_AT = "2026-01-01T00:00:00.000Z";

function sampleFile(fileId = "f1", revenue = 500): { descriptor: FileDescriptor; cells: CellRecord[] } {
  const sheets = [
    { name: "Summary", cells: cellsFromGrid(fileId, "Summary", [["Total", 10]]) },
    {
      name: "Data",
      cells: cellsFromGrid(fileId, "Data", [
        ["Company", "Revenue"],
        ["ABC Bhd", revenue],
        ["XYZ Corp", 700],
      ]),
    },
  ];
  return {
    descriptor: buildFileDescriptor(fileId, "book.xlsx", sheets, INGESTED_AT),
    cells: sheets.flatMap((sheet) => sheet.cells),
  };
}

function captureIngestError(fn: () => unknown): IngestError {
  try {
    fn();
  } catch (err) {
    if (err instanceof IngestError) return err;
    throw err;
  }
  throw new Error("expected an IngestError");
}

describe("InMemoryCellStore", () => {
  it("ingests a file and lists its sheets in descriptor order", () => {
    const store = new InMemoryCellStore();
    const { descriptor, cells } = sampleFile();

    expect(store.ingest(descriptor, cells)).toBe("f1");
    expect(store.getSheets("f1").map((sheet) => [sheet.name, sheet.cellCount])).toEqual([
      ["Summary", 2],
      ["Data", 6],
    ]);
    expect(store.getSheets().length).toBe(2);
    expect(store.getFile("f1")?.displayName).toBe("book.xlsx");
  });

  it("yields cells in row-major order regardless of input order", () => {
    const store = new InMemoryCellStore();
    const { descriptor, cells } = sampleFile();
    store.ingest(descriptor, [...cells].reverse());

    const addresses = [...store.findCells({ fileId: "f1", sheetName: "Data" })].map((cell) => cell.address);
    expect(addresses).toEqual(["A1", "B1", "A2", "B2", "A3", "B3"]);
  });

  it("filters with a predicate across files", () => {
    const store = new InMemoryCellStore();
    const first = sampleFile("f1");
    const second = sampleFile("f2", 900);
    store.ingest(first.descriptor, first.cells);
    store.ingest(second.descriptor, second.cells);

    const matches = [...store.findCells({ predicate: satisfiesAll([{ operator: "gt", threshold: 600 }]) })];
    expect(matches.map((cell) => `${cell.fileId}:${cell.sheetName}!${cell.address}`)).toEqual([
      "f1:Data!B3",
      "f2:Data!B2",
      "f2:Data!B3",
    ]);
  });

  it("returns nothing for unknown files and sheets", () => {
    const store = new InMemoryCellStore();
    const { descriptor, cells } = sampleFile();
    store.ingest(descriptor, cells);

    expect([...store.findCells({ fileId: "missing" })]).toEqual([]);
    expect([...store.findCells({ fileId: "f1", sheetName: "Missing" })]).toEqual([]);
    expect(store.getSheets("missing")).toEqual([]);
  });

  it("rejects duplicate coordinates without touching the existing version", () => {
    const store = new InMemoryCellStore();
    const { descriptor, cells } = sampleFile();
    store.ingest(descriptor, cells);
    const before = store.stats();

    const duplicate = createCellRecord({ fileId: "f1", sheetName: "Data", row: 2, column: 1, value: "Other Bhd" });
    const error = captureIngestError(() => store.ingest(descriptor, [...cells, duplicate]));

    expect(error.name).toBe("IngestError");
    expect(error.code).toBe("duplicate_cell");
    expect(error.coordinate).toEqual({ fileId: "f1", sheetName: "Data", row: 2, column: 1, address: "Data!A2" });
    expect(store.stats()).toEqual(before);
    expect([...store.findCells({ fileId: "f1", sheetName: "Data" })].map((cell) => cell.rawText)).toContain("ABC Bhd");
  });

  it("allows the same coordinate on different sheets", () => {
    const store = new InMemoryCellStore();
    const { descriptor, cells } = sampleFile();
    // Summary!A1 and Data!A1 share (row 1, column 1).
    expect(() => store.ingest(descriptor, cells)).not.toThrow();
  });

  it("rejects cells outside the descriptor", () => {
    const store = new InMemoryCellStore();
    const { descriptor, cells } = sampleFile();

    const stray = createCellRecord({ fileId: "f1", sheetName: "Hidden", row: 1, column: 1, value: "x" });
    expect(captureIngestError(() => store.ingest(descriptor, [...cells, stray])).code).toBe("unknown_sheet");

    const foreign = createCellRecord({ fileId: "f2", sheetName: "Data", row: 9, column: 1, value: "x" });
    expect(captureIngestError(() => store.ingest(descriptor, [...cells, foreign])).code).toBe("file_mismatch");

    const relabelled: CellRecord = { ...createCellRecord({ fileId: "f1", sheetName: "Data", row: 9, column: 1, value: "x" }), address: "Z9" };
    expect(captureIngestError(() => store.ingest(descriptor, [...cells, relabelled])).code).toBe("invalid_cell");

    expect(store.listFiles()).toEqual([]);
  });

  it("rejects malformed descriptors", () => {
    const store = new InMemoryCellStore();
    const { descriptor, cells } = sampleFile();

    const badDate = captureIngestError(() => store.ingest({ ...descriptor, ingestedAt: "yesterday" }, cells));
    expect(badDate.code).toBe("invalid_descriptor");
    expect(badDate.message).toContain("ingestedAt");

    const firstSheet = descriptor.sheets[0];
    if (!firstSheet) throw new Error("fixture has no sheets");
    const duplicateSheets = captureIngestError(() => store.ingest({ ...descriptor, sheets: [firstSheet, firstSheet] }, []));
    expect(duplicateSheets.code).toBe("invalid_descriptor");
    expect(duplicateSheets.message).toContain('duplicate sheet name "Summary"');
  });

  it("replaces a file atomically on re-ingestion", () => {
    const store = new InMemoryCellStore();
    const v1 = sampleFile("f1", 500);
    const v2 = sampleFile("f1", 800);
    store.ingest(v1.descriptor, v1.cells);

    // An iteration started before the swap keeps reading the old version.
    const inFlight = store.findCells({ fileId: "f1", sheetName: "Data" })[Symbol.iterator]();
    const first = inFlight.next();
    store.ingest(v2.descriptor, v2.cells);

    const rest: string[] = [];
    for (let step = inFlight.next(); !step.done; step = inFlight.next()) rest.push(step.value.rawText);
    expect(first.done).toBe(false);
    expect(rest).toContain("500");

    const current = [...store.findCells({ fileId: "f1", sheetName: "Data" })].map((cell) => cell.rawText);
    expect(current).toContain("800");
    expect(current).not.toContain("500");
    expect(store.stats().fileCount).toBe(1);
  });

  it("removes files with their cells", () => {
    const store = new InMemoryCellStore();
    const { descriptor, cells } = sampleFile();
    store.ingest(descriptor, cells);

    expect(store.removeFile("f1")).toBe(true);
    expect(store.removeFile("f1")).toBe(false);
    expect(store.getSheets()).toEqual([]);
    expect([...store.findCells()]).toEqual([]);
  });

  it("reports statistics", () => {
    const store = new InMemoryCellStore();
    const { descriptor, cells } = sampleFile();
    store.ingest(descriptor, cells);

    expect(store.stats()).toEqual({ fileCount: 1, sheetCount: 2, cellCount: 8, numericCellCount: 3, textCellCount: 5 });
  });

  it("logs ingestions and rejections", () => {
    const lines: string[] = [];
    const logger = pino({ level: "info" }, { write: (msg: string) => void lines.push(msg) });
    const store = new InMemoryCellStore({ logger });
    const { descriptor, cells } = sampleFile();

    store.ingest(descriptor, cells);
    captureIngestError(() => store.ingest({ ...descriptor, displayName: "" }, cells));

    const entries = lines.map((line): unknown => JSON.parse(line));
    expect(entries[0]).toMatchObject({ msg: "ingested file", fileId: "f1", sheetCount: 2, cellCount: 8, replaced: false });
    expect(entries[1]).toMatchObject({ msg: "rejected ingestion", code: "invalid_descriptor" });
  });
});
