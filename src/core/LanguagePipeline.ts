/**
 * LanguagePipeline - language detection, translation and sentiment around a
 * turn. Every operation fails open: a broken collaborator never fails the turn.
 */

import type {
  LanguageDetection,
  LanguageDetector,
  SentimentAnalyzer,
  TranslationResult,
  Translator,
} from "../types/language";
import { getErrorMessage, TurnAbortedError } from "../utils/errors";
import { logger } from "../utils/logger";
import { withTimeout } from "../utils/retry";

export interface LanguagePipelineOptions {
  detector?: LanguageDetector;
  translator?: Translator;
  sentiment?: SentimentAnalyzer;
  supportedLanguages: readonly string[];
  defaultLanguage: string;
  translationTimeoutMs: number;
  /** Bound on detection and sentiment scoring */
  analysisTimeoutMs: number;
}

const DIGITS_ONLY = /^[\d\s.,:+-]+$/;

export class LanguagePipeline {
  constructor(private readonly options: LanguagePipelineOptions) {}

  get defaultLanguage(): string {
    return this.options.defaultLanguage;
  }

  isSupported(code: string): boolean {
    return this.options.supportedLanguages.includes(code);
  }

  /**
   * Confidence 0 means the text carried no language signal (empty or only
   * digits) and the caller should keep the language it had.
   */
  async detect(text: string, signal?: AbortSignal): Promise<LanguageDetection> {
    const trimmed = text.trim();
    const fallback = { code: this.options.defaultLanguage, confidence: 0 };
    const detector = this.options.detector;

    if (trimmed.length === 0 || DIGITS_ONLY.test(trimmed)) {
      return fallback;
    }
    if (!detector) {
      return fallback;
    }

    try {
      const detection = await withTimeout(
        async () => detector.detect(trimmed),
        this.options.analysisTimeoutMs,
        `detect:${detector.name}`,
        signal
      );
      if (!this.isSupported(detection.code)) {
        logger.debug(
          `[LanguagePipeline] Unsupported language "${detection.code}", using ${this.options.defaultLanguage}`
        );
        return {
          code: this.options.defaultLanguage,
          confidence: clamp(detection.confidence, 0, 1),
        };
      }
      return { code: detection.code, confidence: clamp(detection.confidence, 0, 1) };
    } catch (error) {
      if (error instanceof TurnAbortedError) {
        throw error;
      }
      logger.warn(
        `[LanguagePipeline] Detection failed: ${getErrorMessage(error)}`
      );
      return fallback;
    }
  }

  /**
   * Translate into `target`. Text already in the target language is skipped;
   * a missing or failing translator passes the text through as unavailable.
   * Only a caller abort propagates.
   */
  async translate(
    text: string,
    target: string,
    source?: string,
    signal?: AbortSignal
  ): Promise<TranslationResult> {
    if (text.trim().length === 0 || source === target) {
      return { text, status: "skipped" };
    }

    const translator = this.options.translator;
    if (!translator) {
      return { text, status: "unavailable" };
    }

    try {
      const translated = await withTimeout(
        (timeoutSignal) => translator.translate(text, target, source, timeoutSignal),
        this.options.translationTimeoutMs,
        `translate:${translator.name}`,
        signal
      );
      if (translated.trim().length === 0) {
        logger.warn(
          `[LanguagePipeline] ${translator.name} returned an empty translation`
        );
        return { text, status: "unavailable" };
      }
      return { text: translated, status: "translated" };
    } catch (error) {
      if (error instanceof TurnAbortedError) {
        throw error;
      }
      logger.warn(
        `[LanguagePipeline] Translation ${source ?? "auto"}->${target} failed: ${getErrorMessage(error)}`
      );
      return { text, status: "unavailable" };
    }
  }

  /**
   * Score in [-1, 1]; 0 without an analyzer or when it fails
   */
  async sentiment(text: string, signal?: AbortSignal): Promise<number> {
    const analyzer = this.options.sentiment;
    if (!analyzer || text.trim().length === 0) {
      return 0;
    }

    try {
      const score = await withTimeout(
        async () => analyzer.score(text),
        this.options.analysisTimeoutMs,
        `sentiment:${analyzer.name}`,
        signal
      );
      return Number.isFinite(score) ? clamp(score, -1, 1) : 0;
    } catch (error) {
      if (error instanceof TurnAbortedError) {
        throw error;
      }
      logger.warn(
        `[LanguagePipeline] Sentiment with ${analyzer.name} failed: ${getErrorMessage(error)}`
      );
      return 0;
    }
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
