const CHARS_PER_TOKEN = 4;

/**
 * Rough token count: four characters per token, at least one for any text
 */
export function estimateTokens(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  return Math.max(1, Math.ceil(text.length / CHARS_PER_TOKEN));
}
