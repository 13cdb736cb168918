/**
 * LanguagePipeline Tests
 *
 * Detection, translation and sentiment never fail a turn
 */
import { describe, expect, test } from "vitest";
import {
  LanguagePipeline,
  TurnAbortedError,
  type LanguageDetector,
  type LanguagePipelineOptions,
  type SentimentAnalyzer,
  type Translator,
} from "../src/index";
import { PhraseTranslator, StubDetector, StubSentiment } from "./mock-provider";

function pipeline(overrides: Partial<LanguagePipelineOptions> = {}): LanguagePipeline {
  return new LanguagePipeline({
    supportedLanguages: ["en", "es", "fr"],
    defaultLanguage: "en",
    translationTimeoutMs: 50,
    analysisTimeoutMs: 50,
    ...overrides,
  });
}

describe("LanguagePipeline.detect", () => {
  test("should report the detected language", async () => {
    const language = pipeline({ detector: new StubDetector({ code: "es", confidence: 0.7 }) });

    await expect(language.detect("Hola, buenas tardes")).resolves.toEqual({
      code: "es",
      confidence: 0.7,
    });
  });

  test("should report no signal for empty and digits-only text", async () => {
    const language = pipeline({ detector: new StubDetector({ code: "fr", confidence: 0.9 }) });

    await expect(language.detect("   ")).resolves.toEqual({ code: "en", confidence: 0 });
    await expect(language.detect("19:30")).resolves.toEqual({ code: "en", confidence: 0 });
    await expect(language.detect("+34 600 000 000")).resolves.toEqual({
      code: "en",
      confidence: 0,
    });
  });

  test("should map unsupported languages to the default", async () => {
    const language = pipeline({ detector: new StubDetector({ code: "it", confidence: 1.4 }) });

    await expect(language.detect("Buongiorno")).resolves.toEqual({ code: "en", confidence: 1 });
  });

  test("should fall back to the default when detection throws", async () => {
    const language = pipeline({
      detector: new StubDetector(() => {
        throw new Error("model missing");
      }),
    });

    await expect(language.detect("Bonjour")).resolves.toEqual({ code: "en", confidence: 0 });
  });

  test("should report no signal without a detector", async () => {
    await expect(pipeline().detect("Bonjour")).resolves.toEqual({ code: "en", confidence: 0 });
  });

  test("should fall back to the default when detection hangs", async () => {
    const hung: LanguageDetector = { name: "hung", detect: () => new Promise(() => {}) };

    await expect(pipeline({ detector: hung, analysisTimeoutMs: 20 }).detect("Bonjour")).resolves.toEqual({
      code: "en",
      confidence: 0,
    });
  });

  test("should propagate a caller abort during detection", async () => {
    const hung: LanguageDetector = { name: "hung", detect: () => new Promise(() => {}) };
    const controller = new AbortController();
    const pending = pipeline({ detector: hung, analysisTimeoutMs: 1000 }).detect(
      "Bonjour",
      controller.signal
    );

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(TurnAbortedError);
  });
});

describe("LanguagePipeline.translate", () => {
  test("should translate with the translator", async () => {
    const language = pipeline({ translator: new PhraseTranslator({ Hola: "Hello" }) });

    await expect(language.translate("Hola", "en", "es")).resolves.toEqual({
      text: "Hello",
      status: "translated",
    });
  });

  test("should skip text already in the target language", async () => {
    const translator = new PhraseTranslator({});
    const language = pipeline({ translator });

    await expect(language.translate("Hello", "en", "en")).resolves.toEqual({
      text: "Hello",
      status: "skipped",
    });
    expect(translator.calls).toEqual([]);
  });

  test("should pass text through when translation fails", async () => {
    const language = pipeline({ translator: new PhraseTranslator({}) });

    await expect(language.translate("Hola", "en", "es")).resolves.toEqual({
      text: "Hola",
      status: "unavailable",
    });
    await expect(pipeline().translate("Hola", "en", "es")).resolves.toEqual({
      text: "Hola",
      status: "unavailable",
    });
  });

  test("should pass text through when the translator returns nothing", async () => {
    const language = pipeline({ translator: new PhraseTranslator({ Hola: "  " }) });

    await expect(language.translate("Hola", "en", "es")).resolves.toEqual({
      text: "Hola",
      status: "unavailable",
    });
  });

  test("should give up on a slow translator", async () => {
    const slow: Translator = {
      name: "slow",
      translate: () => new Promise((resolve) => setTimeout(() => resolve("late"), 500)),
    };

    await expect(pipeline({ translator: slow }).translate("Hola", "en", "es")).resolves.toEqual({
      text: "Hola",
      status: "unavailable",
    });
  });

  test("should propagate a caller abort", async () => {
    const slow: Translator = {
      name: "slow",
      translate: () => new Promise((resolve) => setTimeout(() => resolve("late"), 500)),
    };
    const controller = new AbortController();
    const pending = pipeline({ translator: slow, translationTimeoutMs: 1000 }).translate(
      "Hola",
      "en",
      "es",
      controller.signal
    );

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(TurnAbortedError);
  });
});

describe("LanguagePipeline.sentiment", () => {
  test("should clamp scores into [-1, 1]", async () => {
    await expect(pipeline({ sentiment: new StubSentiment(3) }).sentiment("great")).resolves.toBe(1);
    await expect(pipeline({ sentiment: new StubSentiment(-0.25) }).sentiment("meh")).resolves.toBe(
      -0.25
    );
  });

  test("should score 0 when the analyzer fails or is missing", async () => {
    const broken: SentimentAnalyzer = {
      name: "broken",
      score: () => {
        throw new Error("no lexicon");
      },
    };

    await expect(pipeline({ sentiment: broken }).sentiment("great")).resolves.toBe(0);
    await expect(pipeline({ sentiment: new StubSentiment(Number.NaN) }).sentiment("x")).resolves.toBe(0);
    await expect(pipeline().sentiment("great")).resolves.toBe(0);
  });

  test("should score 0 when the analyzer hangs", async () => {
    const hung: SentimentAnalyzer = { name: "hung", score: () => new Promise(() => {}) };

    await expect(pipeline({ sentiment: hung, analysisTimeoutMs: 20 }).sentiment("great")).resolves.toBe(0);
  });
});
