import type { CellStore } from "@cellscope/cell-store";
import type { Logger } from "pino";

import { resolveEngineConfig, type EngineConfig } from "./config.ts";
import { assembleContext, type ContextBundle } from "./context-assembler.ts";
import type { IntentCues } from "./cues.ts";
import { analyzeQuery } from "./intent-analyzer.ts";
import { activeIntents } from "./intents.ts";
import { createLogger } from "./logger.ts";
import { planRetrieval } from "./retrieval-planner.ts";
import { createHeuristicTokenEstimator, type TokenEstimator } from "./token-budget.ts";

export interface QueryEngineOptions {
  store: CellStore;
  config?: Partial<EngineConfig>;
  logger?: Logger;
  /** Overrides the `charsPerToken` heuristic from config. */
  estimator?: TokenEstimator;
  cues?: IntentCues;
}

/**
 * Entry point for the API layer: analyze a question, retrieve the matching
 * cells and pack them into a bounded context bundle. Holds no per-query state.
 */
export class QueryEngine {
  readonly config: EngineConfig;
  private readonly store: CellStore;
  private readonly logger: Logger;
  private readonly estimator: TokenEstimator;
  private readonly cues?: IntentCues;

  constructor(options: QueryEngineOptions) {
    this.store = options.store;
    this.config = resolveEngineConfig(options.config);
    this.logger = options.logger ?? createLogger(this.config.logLevel);
    this.estimator = options.estimator ?? createHeuristicTokenEstimator({ charsPerToken: this.config.charsPerToken });
    this.cues = options.cues;
  }

  /**
   * @param fileId - restrict to one ingested file, or `null` for every file
   */
  answerQuery(fileId: string | null, queryText: string): ContextBundle {
    const scope = fileId ?? undefined;
    const sheets = this.store.getSheets(scope);
    const analysis = analyzeQuery(
      queryText,
      sheets.map((sheet) => sheet.name),
      { cueSaturation: this.config.cueSaturation, ...(this.cues ? { cues: this.cues } : {}) },
    );

    const results = planRetrieval(analysis.scores, analysis.filters, this.store, {
      fileId: scope,
      maxItemsPerCategory: this.config.maxItemsPerCategory,
      sheetOrder: this.config.sheetOrder,
      ...(this.cues ? { cues: this.cues } : {}),
    });

    const filesConsidered = scope === undefined
      ? this.store.listFiles().map((file) => file.fileId)
      : this.store.getFile(scope) ? [scope] : [];

    const bundle = assembleContext(
      results,
      { maxTokens: this.config.maxContextTokens, estimator: this.estimator },
      { filesConsidered },
    );

    this.logger.debug(
      {
        fileId,
        intents: activeIntents(analysis.scores),
        mentionedSheetCount: analysis.filters.mentionedSheets.length,
        comparisonCount: analysis.filters.numericComparisons.length,
        keywordCount: analysis.filters.keywordTerms.length,
        sectionCount: bundle.sections.length,
        estimatedTokenCount: bundle.estimatedTokenCount,
        truncated: bundle.truncated,
      },
      "answered query",
    );

    return bundle;
  }
}
