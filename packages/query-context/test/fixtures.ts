import { InMemoryCellStore, buildFileDescriptor, cellsFromGrid, type GridValue } from "@cellscope/cell-store";

export const INGESTED_AT = "2026-01-01T00:00:00.000Z";

export function ingestGrids(
  store: InMemoryCellStore,
  fileId: string,
  displayName: string,
  grids: Record<string, GridValue[][]>,
): string {
  const sheets = Object.entries(grids).map(([name, rows]) => ({ name, cells: cellsFromGrid(fileId, name, rows) }));
  return store.ingest(
    buildFileDescriptor(fileId, displayName, sheets, INGESTED_AT),
    sheets.flatMap((sheet) => sheet.cells),
  );
}

/**
 * Cell counts: Notes 1, Divisions 6, TURN-COS-GP_RM 12.
 */
export function accountsStore(): InMemoryCellStore {
  const store = new InMemoryCellStore();
  ingestGrids(store, "fin-2024", "group-accounts.xlsx", {
    "TURN-COS-GP_RM": [
      ["Company", "Revenue", "Cost of Sales"],
      ["ABC CORPORATION BERHAD", 750000000, 400000000],
      ["Holdings Bhd", 320000000, 150000000],
      ["123", 120000000, 60000000],
    ],
    Divisions: [
      ["Division", "Head"],
      ["Plantation", "Aminah"],
      ["Property", "Lee"],
    ],
    Notes: [["Prepared by finance team"]],
  });
  return store;
}

/** Deterministic PRNG (mulberry32) for property-style tests. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
