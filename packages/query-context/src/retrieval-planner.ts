import {
  createTermMatcher,
  formatCellAddress,
  satisfiesAll,
  type CellRecord,
  type CellStore,
  type SheetDescriptor,
} from "@cellscope/cell-store";

import { DEFAULT_INTENT_CUES, type IntentCues } from "./cues.ts";
import type { FilterSpec } from "./intent-analyzer.ts";
import { activeIntents, type IntentLabel, type IntentScoreMap } from "./intents.ts";
import { tokenize } from "./tokenize.ts";

export interface RetrievalItem {
  readonly address: string;
  readonly displayText: string;
  /** Nearest row label (or column header) for numeric items. */
  readonly label?: string;
}

export interface RetrievalResult {
  readonly category: IntentLabel;
  readonly fileId: string;
  readonly sheetName: string;
  readonly items: readonly RetrievalItem[];
  /** Total matches in this sheet before any cap. */
  readonly matchedCount: number;
  readonly returnedCount: number;
}

/**
 * `cell_count`: cheapest sheets first (ascending cell count, store order on ties).
 * `store`: files in ingestion order, sheets in descriptor order.
 */
export type SheetOrder = "cell_count" | "store";

export interface PlanOptions {
  /** Restrict retrieval to one file; all files are used when omitted. */
  fileId?: string;
  maxItemsPerCategory?: number;
  sheetOrder?: SheetOrder;
  cues?: IntentCues;
}

export const DEFAULT_MAX_ITEMS_PER_CATEGORY = 10;
const MAX_HEADERS_PER_SHEET = 8;

interface Candidate {
  item: RetrievalItem;
  /** Cell identity for cross-category dedup; summaries have none. */
  key: string | null;
}

interface SheetCells {
  cells: readonly CellRecord[];
  textByRow: ReadonlyMap<number, readonly CellRecord[]>;
  textByColumn: ReadonlyMap<number, readonly CellRecord[]>;
}

type CategoryRule = (sheet: SheetDescriptor) => Candidate[];

function pushGrouped(map: Map<number, CellRecord[]>, key: number, cell: CellRecord): void {
  const group = map.get(key);
  if (group) group.push(cell);
  else map.set(key, [cell]);
}

function indexSheet(store: CellStore, sheet: SheetDescriptor): SheetCells {
  const cells = [...store.findCells({ fileId: sheet.fileId, sheetName: sheet.name })];
  const textByRow = new Map<number, CellRecord[]>();
  const textByColumn = new Map<number, CellRecord[]>();
  for (const cell of cells) {
    if (cell.kind !== "text") continue;
    pushGrouped(textByRow, cell.row, cell);
    pushGrouped(textByColumn, cell.column, cell);
  }
  return { cells, textByRow, textByColumn };
}

function cellKey(cell: CellRecord): string {
  return `${cell.fileId}\u0000${cell.sheetName}\u0000${cell.address}`;
}

function usedRange(sheet: SheetDescriptor): string {
  if (sheet.rowCount <= 0 || sheet.columnCount <= 0) return "";
  const end = formatCellAddress(sheet.rowCount, sheet.columnCount);
  return end === "A1" ? end : `A1:${end}`;
}

function dimensions(sheet: SheetDescriptor): string {
  return `${sheet.rowCount} rows x ${sheet.columnCount} columns, ${sheet.cellCount} cells`;
}

/**
 * Sheets to scan: the mentioned sheets when the query names any, otherwise every
 * sheet of the active file(s).
 */
export function candidateSheets(filters: FilterSpec, store: CellStore, options: PlanOptions = {}): SheetDescriptor[] {
  let sheets = store.getSheets(options.fileId);
  if (filters.mentionedSheets.length > 0) {
    const mentioned = new Set(filters.mentionedSheets);
    sheets = sheets.filter((sheet) => mentioned.has(sheet.name));
  }
  if ((options.sheetOrder ?? "cell_count") === "cell_count") {
    // Array.prototype.sort is stable, so ties keep store order.
    sheets = [...sheets].sort((a, b) => a.cellCount - b.cellCount);
  }
  return sheets;
}

class PlanContext {
  private readonly sheetCache = new Map<string, SheetCells>();
  private readonly fileNames = new Map<string, string>();
  readonly claimed = new Set<string>();

  constructor(
    private readonly store: CellStore,
    readonly filters: FilterSpec,
    readonly cues: IntentCues,
  ) {}

  sheetCells(sheet: SheetDescriptor): SheetCells {
    const key = `${sheet.fileId}\u0000${sheet.name}`;
    let cached = this.sheetCache.get(key);
    if (!cached) {
      cached = indexSheet(this.store, sheet);
      this.sheetCache.set(key, cached);
    }
    return cached;
  }

  fileName(fileId: string): string {
    let name = this.fileNames.get(fileId);
    if (name === undefined) {
      name = this.store.getFile(fileId)?.displayName ?? fileId;
      this.fileNames.set(fileId, name);
    }
    return name;
  }
}

function cueTokens(cues: IntentCues): Set<string> {
  const tokens = new Set<string>();
  for (const list of Object.values(cues.categories)) {
    for (const cue of list) for (const token of tokenize(cue)) tokens.add(token);
  }
  return tokens;
}

function entityRule(ctx: PlanContext): CategoryRule {
  const asked = new Set(ctx.filters.entityCues);
  const shapes = ctx.cues.entityShapes
    .filter((group) => group.cues.some((cue) => asked.has(cue.trim().toLowerCase())))
    .flatMap((group) => group.shapes);
  const matchesShape = createTermMatcher(shapes);
  // Header cells such as "Company" are labels, not entities.
  const bareLabels = new Set([...shapes, ...ctx.cues.categories.entity_search]);

  const cueWords = cueTokens(ctx.cues);
  const qualifiers = ctx.filters.keywordTerms.filter((term) => !cueWords.has(term));
  const matchesQualifier = createTermMatcher(qualifiers);

  return (sheet) => {
    const seen = new Set<string>();
    const entities: CellRecord[] = [];
    for (const cell of ctx.sheetCells(sheet).cells) {
      if (cell.kind !== "text" || bareLabels.has(cell.normalizedText)) continue;
      if (!matchesShape(cell.normalizedText) || seen.has(cell.normalizedText)) continue;
      seen.add(cell.normalizedText);
      entities.push(cell);
    }

    // Qualifiers narrow only when one of them matches in this sheet.
    const qualified = entities.filter((cell) => matchesQualifier(cell.normalizedText));
    return (qualified.length > 0 ? qualified : entities).map((cell) => ({
      item: { address: cell.address, displayText: cell.rawText },
      key: cellKey(cell),
    }));
  };
}

function nearestBefore(cells: readonly CellRecord[] | undefined, limit: number, position: (cell: CellRecord) => number): CellRecord | undefined {
  let best: CellRecord | undefined;
  for (const cell of cells ?? []) {
    if (position(cell) < limit && (!best || position(cell) > position(best))) best = cell;
  }
  return best;
}

function numericCandidate(cell: CellRecord, sheetCells: SheetCells): Candidate {
  const rowLabel = nearestBefore(sheetCells.textByRow.get(cell.row), cell.column, (c) => c.column);
  const header = nearestBefore(sheetCells.textByColumn.get(cell.column), cell.row, (c) => c.row);
  const label = (rowLabel ?? header)?.rawText.trim();
  return {
    item: { address: cell.address, displayText: cell.rawText, ...(label ? { label } : {}) },
    key: cellKey(cell),
  };
}

function comparisonRule(ctx: PlanContext): CategoryRule {
  const matches = satisfiesAll(ctx.filters.numericComparisons);
  return (sheet) => {
    const sheetCells = ctx.sheetCells(sheet);
    return sheetCells.cells.filter(matches).map((cell) => numericCandidate(cell, sheetCells));
  };
}

/**
 * Numeric cells next to text mentioning a query keyword: same row, or the
 * nearest text above in the same column.
 */
function keywordNeighbourRule(ctx: PlanContext): CategoryRule {
  const generic = new Set(ctx.cues.genericFinancialTerms);
  const terms = ctx.filters.keywordTerms.filter((term) => !generic.has(term));
  const mentionsTerm = createTermMatcher(terms);
  const isNumeric = satisfiesAll([]);

  return (sheet) => {
    const sheetCells = ctx.sheetCells(sheet);
    return sheetCells.cells
      .filter((cell) => {
        if (!isNumeric(cell)) return false;
        if (terms.length === 0) return true;
        const rowText = sheetCells.textByRow.get(cell.row) ?? [];
        const header = nearestBefore(sheetCells.textByColumn.get(cell.column), cell.row, (c) => c.row);
        return rowText.some((text) => mentionsTerm(text.normalizedText)) || (header !== undefined && mentionsTerm(header.normalizedText));
      })
      .map((cell) => numericCandidate(cell, sheetCells));
  };
}

function summaryRule(describe: (sheet: SheetDescriptor) => string): CategoryRule {
  return (sheet) => [{ item: { address: usedRange(sheet), displayText: describe(sheet) }, key: null }];
}

function headersOf(ctx: PlanContext, sheet: SheetDescriptor): string[] {
  const firstRow = ctx.sheetCells(sheet).textByRow.get(1) ?? [];
  return firstRow.slice(0, MAX_HEADERS_PER_SHEET).map((cell) => cell.rawText.trim());
}

function ruleFor(label: IntentLabel, ctx: PlanContext): CategoryRule {
  switch (label) {
    case "entity_search":
      return entityRule(ctx);
    case "financial_analysis":
      return ctx.filters.numericComparisons.length > 0 ? comparisonRule(ctx) : keywordNeighbourRule(ctx);
    case "numeric_filter":
      return ctx.filters.numericComparisons.length > 0 ? comparisonRule(ctx) : () => [];
    case "sheet_listing":
      return summaryRule((sheet) => `${sheet.name} (file: ${ctx.fileName(sheet.fileId)})`);
    case "structural_query":
      return summaryRule((sheet) => {
        const headers = headersOf(ctx, sheet);
        return headers.length > 0 ? `${sheet.name}: ${dimensions(sheet)}; headers: ${headers.join(", ")}` : `${sheet.name}: ${dimensions(sheet)}`;
      });
    case "general_overview":
      return summaryRule((sheet) => `${sheet.name}: ${dimensions(sheet)}`);
  }
}

/**
 * Turn intent scores and filters into per-category, per-sheet result sets.
 *
 * Results are ordered by descending intent score (ties by label order), then by
 * candidate sheet order. Each category except `general_overview` returns at most
 * `maxItemsPerCategory` items across its sheets; `matchedCount` always reports
 * the true total. A cell
 * matched by a higher-ranked category is not matched again by a lower one.
 */
export function planRetrieval(scores: IntentScoreMap, filters: FilterSpec, store: CellStore, options: PlanOptions = {}): RetrievalResult[] {
  const cap = Math.max(0, Math.floor(options.maxItemsPerCategory ?? DEFAULT_MAX_ITEMS_PER_CATEGORY));
  const sheets = candidateSheets(filters, store, options);
  const ctx = new PlanContext(store, filters, options.cues ?? DEFAULT_INTENT_CUES);
  const results: RetrievalResult[] = [];

  for (const { label } of activeIntents(scores)) {
    const rule = ruleFor(label, ctx);
    // The overview is one row per sheet and is never capped.
    let remaining = label === "general_overview" ? Number.POSITIVE_INFINITY : cap;

    for (const sheet of sheets) {
      const matches = rule(sheet).filter((candidate) => candidate.key === null || !ctx.claimed.has(candidate.key));
      if (matches.length === 0) continue;

      const items = matches.slice(0, remaining).map((candidate) => candidate.item);
      for (const candidate of matches) {
        if (candidate.key !== null) ctx.claimed.add(candidate.key);
      }
      remaining -= items.length;

      results.push({
        category: label,
        fileId: sheet.fileId,
        sheetName: sheet.name,
        items,
        matchedCount: matches.length,
        returnedCount: items.length,
      });
    }
  }

  return results;
}
