export { ConfigError, EngineConfigSchema, loadEngineConfig, resolveEngineConfig } from "./config.ts";
export type { EngineConfig } from "./config.ts";
export { assembleContext, formatItemLine, formatSectionHeader } from "./context-assembler.ts";
export type { AssembleOptions, ContextBundle } from "./context-assembler.ts";
export { DEFAULT_INTENT_CUES, DEFAULT_STOPWORDS, IntentCuesSchema } from "./cues.ts";
export type { IntentCues } from "./cues.ts";
export { analyzeQuery } from "./intent-analyzer.ts";
export type { AnalyzeOptions, FilterSpec, QueryAnalysis } from "./intent-analyzer.ts";
export { INTENT_LABELS, activeIntents } from "./intents.ts";
export type { ActiveIntent, CueIntentLabel, IntentLabel, IntentScoreMap } from "./intents.ts";
export { createLogger } from "./logger.ts";
export { QueryEngine } from "./query-engine.ts";
export type { QueryEngineOptions } from "./query-engine.ts";
export { DEFAULT_MAX_ITEMS_PER_CATEGORY, candidateSheets, planRetrieval } from "./retrieval-planner.ts";
export type { PlanOptions, RetrievalItem, RetrievalResult, SheetOrder } from "./retrieval-planner.ts";
export { serializeContextBundle } from "./serialize.ts";
export { DEFAULT_CHARS_PER_TOKEN, DEFAULT_TOKEN_ESTIMATOR, createHeuristicTokenEstimator, estimateTokens } from "./token-budget.ts";
export type { TokenBudget, TokenEstimator } from "./token-budget.ts";
export { isNumericToken, normalizeQuery, tokenize } from "./tokenize.ts";
