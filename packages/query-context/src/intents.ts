/**
 * Fixed, ordered set of intent labels. The order doubles as the tie-break when
 * two intents score the same.
 */
export const INTENT_LABELS = [
  "entity_search",
  "financial_analysis",
  "numeric_filter",
  "sheet_listing",
  "structural_query",
  "general_overview",
] as const;

export type IntentLabel = (typeof INTENT_LABELS)[number];

/** Intents scored from curated cue words in the query. */
export type CueIntentLabel = Exclude<IntentLabel, "numeric_filter" | "general_overview">;

/**
 * Independent activations in [0, 1]; every label is present. Scores do not sum to 1.
 */
export type IntentScoreMap = Readonly<Record<IntentLabel, number>>;

export interface ActiveIntent {
  label: IntentLabel;
  score: number;
}

export function emptyScores(): Record<IntentLabel, number> {
  return {
    entity_search: 0,
    financial_analysis: 0,
    numeric_filter: 0,
    sheet_listing: 0,
    structural_query: 0,
    general_overview: 0,
  };
}

/**
 * Intents with a positive score, highest first; ties follow {@link INTENT_LABELS}.
 */
export function activeIntents(scores: IntentScoreMap): ActiveIntent[] {
  return INTENT_LABELS.map((label, order) => ({ label, score: scores[label], order }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .map(({ label, score }) => ({ label, score }));
}
