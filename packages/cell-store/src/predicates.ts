import type { CellKind, CellRecord } from "./types.ts";

export type ComparisonOperator = "gt" | "lt" | "ge" | "le" | "eq";

export interface NumericComparison {
  operator: ComparisonOperator;
  threshold: number;
}

export type CellPredicate = (cell: CellRecord) => boolean;

export const anyCell: CellPredicate = () => true;

export function isKind(kind: CellKind): CellPredicate {
  return (cell) => cell.kind === kind;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build a matcher for normalized terms that only hits whole words/phrases:
 * `bhd` matches `holdings bhd` but `co` does not match `cost`.
 */
export function createTermMatcher(terms: Iterable<string>): (text: string) => boolean {
  const unique = [...new Set([...terms].map((term) => term.trim().toLowerCase()).filter((term) => term.length > 0))];
  if (unique.length === 0) return () => false;
  // Longest first so phrases win over their own prefixes.
  unique.sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
  const pattern = new RegExp(`(?:^|[^\\p{L}\\p{N}])(?:${unique.map(escapeRegExp).join("|")})(?=$|[^\\p{L}\\p{N}])`, "u");
  return (text) => pattern.test(text);
}

export function textContainsAny(terms: Iterable<string>): CellPredicate {
  const matches = createTermMatcher(terms);
  return (cell) => cell.kind === "text" && matches(cell.normalizedText);
}

export function satisfiesComparison(value: number, comparison: NumericComparison): boolean {
  switch (comparison.operator) {
    case "gt":
      return value > comparison.threshold;
    case "lt":
      return value < comparison.threshold;
    case "ge":
      return value >= comparison.threshold;
    case "le":
      return value <= comparison.threshold;
    case "eq":
      return value === comparison.threshold;
  }
}

/**
 * Numeric cells satisfying every comparison. An empty list matches every numeric cell.
 */
export function satisfiesAll(comparisons: readonly NumericComparison[]): CellPredicate {
  return (cell) => {
    const value = cell.numericValue;
    if (cell.kind !== "numeric" || value === undefined) return false;
    return comparisons.every((comparison) => satisfiesComparison(value, comparison));
  };
}

export function allOf(...predicates: CellPredicate[]): CellPredicate {
  return (cell) => predicates.every((predicate) => predicate(cell));
}

export function anyOf(...predicates: CellPredicate[]): CellPredicate {
  return (cell) => predicates.some((predicate) => predicate(cell));
}
