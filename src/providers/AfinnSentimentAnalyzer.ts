/**
 * Lexicon sentiment with the AFINN word list of the `sentiment` package
 */

import Sentiment from "sentiment";
import type { SentimentAnalyzer } from "../types/language";

/** AFINN word scores run from -5 to 5 */
const AFINN_RANGE = 5;

export class AfinnSentimentAnalyzer implements SentimentAnalyzer {
  readonly name = "afinn";
  private readonly analyzer = new Sentiment();

  /**
   * Average word score scaled to [-1, 1]. English text only.
   */
  score(text: string): number {
    const { comparative } = this.analyzer.analyze(text);
    return Math.max(-1, Math.min(1, comparative / AFINN_RANGE));
  }
}
