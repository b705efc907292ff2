/**
 * Approximate token counting.
 *
 * Uses a simple heuristic (~3.5 chars per token for English technical text).
 * Used for summarization triggers; exact counts are not needed.
 */

const CHARS_PER_TOKEN = 3.5;

/**
 * Approximate token count for a string.
 * Biased slightly high so prompts are not over-stuffed.
 */
export function approximateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
