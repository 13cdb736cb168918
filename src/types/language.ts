/**
 * Language-processing collaborator types
 */

export interface LanguageDetection {
  /** ISO 639-1 code */
  code: string;
  /** 0..1 */
  confidence: number;
}

export interface LanguageDetector {
  readonly name: string;
  detect(text: string): LanguageDetection | Promise<LanguageDetection>;
}

export interface Translator {
  readonly name: string;
  translate(
    text: string,
    target: string,
    source?: string,
    signal?: AbortSignal
  ): Promise<string>;
}

/**
 * - translated: the translator produced the text
 * - skipped: no translation was needed
 * - unavailable: the translator is absent or failed; the input passed through
 */
export type TranslationStatus = "translated" | "skipped" | "unavailable";

export interface TranslationResult {
  text: string;
  status: TranslationStatus;
}

export interface SentimentAnalyzer {
  readonly name: string;
  /** Score in [-1, 1] */
  score(text: string): number | Promise<number>;
}

/**
 * Speech-to-text collaborator feeding messages upstream of the engine
 */
export interface Transcriber {
  readonly name: string;
  transcribe(
    audio: Uint8Array,
    options?: { languageHint?: string; signal?: AbortSignal }
  ): Promise<{ transcript: string; language?: string }>;
}
