/**
 * Provider exports and construction from configuration
 */

import type { EngineConfig } from "../config";
import type { CompletionProvider } from "../types/ai";
import type { Embedder } from "../types/retrieval";
import { ValidationError } from "../utils/errors";
import { AnthropicProvider } from "./AnthropicProvider";
import { GeminiEmbedder } from "./GeminiEmbedder";
import { GeminiProvider } from "./GeminiProvider";
import { OpenAIEmbedder } from "./OpenAIEmbedder";
import { OpenAIProvider } from "./OpenAIProvider";

export { AnthropicProvider } from "./AnthropicProvider";
export type { AnthropicProviderOptions } from "./AnthropicProvider";

export { GeminiProvider } from "./GeminiProvider";
export type { GeminiProviderOptions } from "./GeminiProvider";

export { OpenAIProvider } from "./OpenAIProvider";
export type { OpenAIProviderOptions } from "./OpenAIProvider";

export { OpenAIEmbedder } from "./OpenAIEmbedder";
export type { OpenAIEmbedderOptions } from "./OpenAIEmbedder";
export { GeminiEmbedder } from "./GeminiEmbedder";
export type { GeminiEmbedderOptions } from "./GeminiEmbedder";

export { CompletionTranslator, languageName } from "./CompletionTranslator";
export { CompletionSlotExtractor } from "./CompletionSlotExtractor";
export type { CompletionSlotExtractorOptions } from "./CompletionSlotExtractor";
export { PatternSlotExtractor } from "./PatternSlotExtractor";
export type { SlotLexicon } from "./PatternSlotExtractor";
export { FrancLanguageDetector } from "./FrancLanguageDetector";
export type { FrancLanguageDetectorOptions } from "./FrancLanguageDetector";
export { AfinnSentimentAnalyzer } from "./AfinnSentimentAnalyzer";
export { runWithBackupModels, shouldUseBackupModel } from "./backup";

function requireApiKey(config: EngineConfig["provider"]): string {
  if (!config.apiKey) {
    throw new ValidationError(
      `An API key is required for provider "${config.name}"`
    );
  }
  return config.apiKey;
}

/**
 * Completion provider selected by `provider.name`
 */
export function createCompletionProvider(
  config: EngineConfig["provider"]
): CompletionProvider {
  const apiKey = requireApiKey(config);
  const options = {
    apiKey,
    model: config.model,
    backupModels: config.backupModels,
  };

  switch (config.name) {
    case "openai":
      return new OpenAIProvider(options);
    case "anthropic":
      return new AnthropicProvider(options);
    case "gemini":
      return new GeminiProvider(options);
  }
}

/**
 * Embedder for the configured provider. Anthropic has no embeddings API,
 * so it gets none.
 */
export function createEmbedder(
  config: EngineConfig["provider"]
): Embedder | undefined {
  switch (config.name) {
    case "openai":
      return new OpenAIEmbedder({
        apiKey: requireApiKey(config),
        model: config.embeddingModel,
      });
    case "gemini":
      return new GeminiEmbedder({
        apiKey: requireApiKey(config),
        model: config.embeddingModel,
      });
    case "anthropic":
      return undefined;
  }
}
