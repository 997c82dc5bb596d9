import type { RetrievalItem, RetrievalResult } from "./retrieval-planner.ts";
import { DEFAULT_TOKEN_ESTIMATOR, type TokenBudget } from "./token-budget.ts";

export interface ContextBundle {
  /** Sections in planner order; each carries only the items that fit. */
  readonly sections: readonly RetrievalResult[];
  readonly estimatedTokenCount: number;
  /** True when fewer items were returned than matched across all input results. */
  readonly truncated: boolean;
  /** Sorted, unique file ids. */
  readonly filesConsidered: readonly string[];
}

export interface AssembleOptions {
  /** Files the planner scanned. Defaults to the files appearing in `results`. */
  filesConsidered?: Iterable<string>;
}

export function formatSectionHeader(result: RetrievalResult): string {
  return `[${result.category}] ${result.sheetName} (${result.matchedCount} matched)`;
}

export function formatItemLine(item: RetrievalItem): string {
  const body = item.address ? `${item.address}: ${item.displayText}` : item.displayText;
  return item.label ? `${body} (${item.label})` : body;
}

/** `Infinity` means unbounded; NaN and negative budgets admit nothing. */
function budgetLimit(maxTokens: number): number {
  if (maxTokens === Number.POSITIVE_INFINITY) return maxTokens;
  return Number.isFinite(maxTokens) ? Math.max(0, Math.floor(maxTokens)) : 0;
}

/**
 * Pack planner results into a bundle under a token budget.
 *
 * Sections are taken in order; each costs its header line plus one line per
 * item. Only whole items are included. The first section that does not fit
 * completely is cut to the items that do, and nothing after it is included.
 */
export function assembleContext(results: readonly RetrievalResult[], budget: TokenBudget, options: AssembleOptions = {}): ContextBundle {
  const estimator = budget.estimator ?? DEFAULT_TOKEN_ESTIMATOR;
  let remaining = budgetLimit(budget.maxTokens);
  let used = 0;
  const sections: RetrievalResult[] = [];

  for (const result of results) {
    let cost = estimator.estimateTextTokens(formatSectionHeader(result));
    if (cost > remaining) break;

    const items: RetrievalItem[] = [];
    let cut = false;
    for (const item of result.items) {
      const lineCost = estimator.estimateTextTokens(formatItemLine(item));
      if (cost + lineCost > remaining) {
        cut = true;
        break;
      }
      items.push(item);
      cost += lineCost;
    }

    // A header with none of its items is noise.
    if (result.items.length > 0 && items.length === 0) break;

    sections.push({ ...result, items, returnedCount: items.length });
    remaining -= cost;
    used += cost;
    if (cut) break;
  }

  let matched = 0;
  for (const result of results) matched += result.matchedCount;
  let returned = 0;
  for (const section of sections) returned += section.returnedCount;

  const files = options.filesConsidered ?? results.map((result) => result.fileId);

  return {
    sections,
    estimatedTokenCount: used,
    truncated: matched > returned,
    filesConsidered: [...new Set(files)].sort(),
  };
}
