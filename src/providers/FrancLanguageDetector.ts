/**
 * Language detection with franc's trigram model
 */

import { francAll } from "franc";
import type { LanguageDetection, LanguageDetector } from "../types/language";

/** ISO 639-1 to the ISO 639-3 codes franc reports */
const ISO_639_3: Readonly<Record<string, string>> = {
  en: "eng",
  es: "spa",
  fr: "fra",
  de: "deu",
  ca: "cat",
  ru: "rus",
  it: "ita",
  pt: "por",
  nl: "nld",
};

export interface FrancLanguageDetectorOptions {
  /** ISO 639-1 codes to choose from */
  languages: readonly string[];
  /** Shorter texts are reported as undetermined */
  minLength?: number;
}

export class FrancLanguageDetector implements LanguageDetector {
  readonly name = "franc";
  private readonly only: string[];
  private readonly toIso1: Map<string, string>;

  constructor(private readonly options: FrancLanguageDetectorOptions) {
    this.toIso1 = new Map(
      options.languages
        .filter((code) => code in ISO_639_3)
        .map((code) => [ISO_639_3[code], code])
    );
    this.only = [...this.toIso1.keys()];
  }

  /**
   * Confidence is the margin between the best and the second-best candidate
   */
  detect(text: string): LanguageDetection {
    const ranked = francAll(text, {
      only: this.only,
      minLength: this.options.minLength ?? 3,
    });
    const [best, second] = ranked;
    const code = best ? this.toIso1.get(best[0]) : undefined;
    if (!best || !code) {
      return { code: "und", confidence: 0 };
    }
    return { code, confidence: second ? best[1] - second[1] : best[1] };
  }
}
