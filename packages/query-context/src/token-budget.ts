export interface TokenEstimator {
  estimateTextTokens(text: string): number;
}

export interface TokenBudget {
  maxTokens: number;
  estimator?: TokenEstimator;
}

export const DEFAULT_CHARS_PER_TOKEN = 4;

/**
 * Proportional estimate: `ceil(characters / charsPerToken)`. This is not a
 * tokenizer; 4 characters per token over-counts typical English and numeric
 * spreadsheet text for common model vocabularies.
 */
export function createHeuristicTokenEstimator(options: { charsPerToken?: number } = {}): TokenEstimator {
  const charsPerToken = options.charsPerToken ?? DEFAULT_CHARS_PER_TOKEN;
  if (!Number.isFinite(charsPerToken) || charsPerToken <= 0) {
    throw new Error(`charsPerToken must be a positive number, got ${charsPerToken}`);
  }
  return {
    estimateTextTokens(text: string): number {
      return text.length === 0 ? 0 : Math.ceil(text.length / charsPerToken);
    },
  };
}

export const DEFAULT_TOKEN_ESTIMATOR: TokenEstimator = createHeuristicTokenEstimator();

export function estimateTokens(text: string, estimator: TokenEstimator = DEFAULT_TOKEN_ESTIMATOR): number {
  return estimator.estimateTextTokens(text);
}
