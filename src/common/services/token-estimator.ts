/**
 * Token Estimator Service
 *
 * One estimate shared by the chunker, the retriever's packing budget and the
 * prompt assembler, so that a budget checked in one place holds in the others.
 *
 * Estimation formula: ~4 characters per token (Claude and Voyage tokenizers
 * land within +/- 20% of this on English prose).
 *
 * @example
 * estimateTokens('Our product reduces churn by 30%.'); // 9
 * charsForTokens(250); // 1000
 */

export const CHARS_PER_TOKEN = 4;

/**
 * Estimate token count for a text
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Character capacity of a token budget
 */
export function charsForTokens(tokens: number): number {
  return Math.max(0, Math.floor(tokens * CHARS_PER_TOKEN));
}
