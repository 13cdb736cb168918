/**
 * Proverb types
 */

export type SentimentCategory = "positive" | "negative" | "neutral";

export interface Proverb {
  id: string;
  /** Catalan text */
  text: string;
  /** English rendering */
  translation: string;
  sentiment: SentimentCategory;
}

/**
 * Supplies a proverb matching the mood of a turn
 */
export interface ProverbSource {
  readonly name: string;
  pick(category: SentimentCategory): Proverb;
}
