import { createTermMatcher, parseSpreadsheetNumber, type NumericComparison } from "@cellscope/cell-store";

import { DEFAULT_INTENT_CUES, DEFAULT_STOPWORDS, type IntentCues } from "./cues.ts";
import { emptyScores, type CueIntentLabel, type IntentScoreMap } from "./intents.ts";
import { containsPhrase, isNumericToken, normalizeQuery, tokenize } from "./tokenize.ts";

export interface FilterSpec {
  /** Known sheet names present in the query, in the order they were supplied. */
  readonly mentionedSheets: readonly string[];
  readonly numericComparisons: readonly NumericComparison[];
  /** Normalized content tokens, first occurrence order, without stopwords or sheet-name tokens. */
  readonly keywordTerms: readonly string[];
  /** Entity cue terms found anywhere in the query, sheet names included. */
  readonly entityCues: readonly string[];
}

export interface QueryAnalysis {
  readonly scores: IntentScoreMap;
  readonly filters: FilterSpec;
}

export interface AnalyzeOptions {
  /**
   * Number of distinct cue hits at which a category saturates at 1.0.
   * Score = min(1, hits / cueSaturation).
   */
  cueSaturation?: number;
  cues?: IntentCues;
  stopwords?: ReadonlySet<string>;
}

const CUE_LABELS: readonly CueIntentLabel[] = ["entity_search", "financial_analysis", "sheet_listing", "structural_query"];

interface CompiledCue {
  term: string;
  matches: (text: string) => boolean;
}

interface CompiledCues {
  categories: Record<CueIntentLabel, CompiledCue[]>;
  comparison: RegExp;
  operators: ReadonlyMap<string, NumericComparison["operator"]>;
  magnitudes: ReadonlyMap<string, number>;
}

const compiledCache = new WeakMap<IntentCues, CompiledCues>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function alternation(terms: Iterable<string>): string {
  return [...terms]
    .map((term) => term.trim().toLowerCase())
    .filter((term) => term.length > 0)
    .sort((a, b) => b.length - a.length)
    .map((term) => escapeRegExp(term).replace(/\s+/g, "\\s+"))
    .join("|");
}

function compileCues(cues: IntentCues): CompiledCues {
  const cached = compiledCache.get(cues);
  if (cached) return cached;

  const matchersFor = (terms: readonly string[]): CompiledCue[] =>
    terms.map((term) => ({ term: term.trim().toLowerCase(), matches: createTermMatcher([term]) }));
  const operators = new Map(Object.entries(cues.comparisonPhrases).map(([phrase, op]) => [phrase.toLowerCase().replace(/\s+/g, " "), op]));
  const magnitudes = new Map(Object.entries(cues.magnitudes).map(([word, factor]) => [word.toLowerCase(), factor]));

  const currencies = alternation(cues.currencyPrefixes);
  const magnitudeWords = alternation(magnitudes.keys());
  const comparison = new RegExp(
    `(?<![\\p{L}\\p{N}])(${alternation(operators.keys())})\\s+` +
      (currencies ? `(?:(?:${currencies})\\s*)?` : "") +
      `([-+]?(?:\\d[\\d,]*(?:\\.\\d+)?|\\.\\d+))` +
      (magnitudeWords ? `(?:\\s*(${magnitudeWords})(?![\\p{L}\\p{N}]))?` : ""),
    "gu",
  );

  const compiled: CompiledCues = {
    categories: {
      entity_search: matchersFor(cues.categories.entity_search),
      financial_analysis: matchersFor(cues.categories.financial_analysis),
      sheet_listing: matchersFor(cues.categories.sheet_listing),
      structural_query: matchersFor(cues.categories.structural_query),
    },
    comparison,
    operators,
    magnitudes,
  };
  compiledCache.set(cues, compiled);
  return compiled;
}

/**
 * Scan for "<phrase> <number> [magnitude]" comparisons. Returns every phrase hit
 * (used as the numeric_filter cue count) and the comparisons whose number parsed.
 */
function extractComparisons(lowerQuery: string, compiled: CompiledCues): { hits: number; comparisons: NumericComparison[] } {
  const comparisons: NumericComparison[] = [];
  let hits = 0;
  for (const match of lowerQuery.matchAll(compiled.comparison)) {
    hits += 1;
    const operator = compiled.operators.get((match[1] ?? "").replace(/\s+/g, " "));
    const value = parseSpreadsheetNumber((match[2] ?? "").replace(/[,.]+$/, ""));
    if (operator === undefined || value === null) continue;
    const factor = match[3] ? compiled.magnitudes.get(match[3]) ?? 1 : 1;
    comparisons.push({ operator, threshold: value * factor });
  }
  return { hits, comparisons };
}

function findMentionedSheets(lowerQuery: string, knownSheetNames: Iterable<string>): string[] {
  const mentioned: string[] = [];
  for (const name of new Set(knownSheetNames)) {
    const needle = name.trim().toLowerCase();
    if (containsPhrase(lowerQuery, needle)) mentioned.push(name);
  }
  return mentioned;
}

/**
 * Score a free-text query against each intent category and extract filters.
 *
 * Every score comes from cues found in the query itself; a category with no
 * matching cue scores 0. When nothing matches, only `general_overview` is active.
 * Never throws.
 */
export function analyzeQuery(queryText: string, knownSheetNames: Iterable<string>, options: AnalyzeOptions = {}): QueryAnalysis {
  const cues = options.cues ?? DEFAULT_INTENT_CUES;
  const stopwords = options.stopwords ?? DEFAULT_STOPWORDS;
  const saturation = Math.max(1, options.cueSaturation ?? 2);
  const compiled = compileCues(cues);

  const text = typeof queryText === "string" ? queryText : "";
  const lowerQuery = text.toLowerCase().replace(/\s+/g, " ");
  const normalized = normalizeQuery(text);

  const scores = emptyScores();
  let entityCues: string[] = [];
  for (const label of CUE_LABELS) {
    const hits = compiled.categories[label].filter((cue) => cue.matches(normalized)).map((cue) => cue.term);
    scores[label] = Math.min(1, hits.length / saturation);
    if (label === "entity_search") entityCues = hits;
  }

  const { hits: comparisonHits, comparisons } = extractComparisons(lowerQuery, compiled);
  scores.numeric_filter = Math.min(1, comparisonHits / saturation);

  if (Object.values(scores).every((score) => score === 0)) {
    scores.general_overview = 1;
  }

  const mentionedSheets = findMentionedSheets(lowerQuery, knownSheetNames);
  const sheetTokens = new Set(mentionedSheets.flatMap((name) => tokenize(name)));
  const keywordTerms = [
    ...new Set(tokenize(normalized).filter((token) => !stopwords.has(token) && !sheetTokens.has(token) && !isNumericToken(token))),
  ];

  return {
    scores,
    filters: { mentionedSheets, numericComparisons: comparisons, keywordTerms, entityCues },
  };
}
