/**
 * Gemini completion provider with backup models
 */

import { GoogleGenAI } from "@google/genai";
import type { GenerateContentConfig } from "@google/genai";

import type {
  CompletionInput,
  CompletionOutput,
  CompletionProvider,
} from "../types/ai";
import { ExternalServiceError } from "../utils/errors";
import { runWithBackupModels } from "./backup";

export interface GeminiProviderOptions {
  apiKey: string;
  /** e.g. "gemini-2.0-flash" */
  model: string;
  backupModels?: string[];
  config?: Partial<GenerateContentConfig>;
  client?: GoogleGenAI;
}

export class GeminiProvider implements CompletionProvider {
  public readonly name = "gemini";
  private genAI: GoogleGenAI;
  private models: string[];
  private config?: Partial<GenerateContentConfig>;

  constructor(options: GeminiProviderOptions) {
    const { apiKey, model, backupModels = [], config } = options;

    if (!apiKey && !options.client) {
      throw new Error("Gemini API key is required");
    }
    if (!model) {
      throw new Error("Model is required. Example: 'gemini-2.0-flash'");
    }

    this.genAI = options.client ?? new GoogleGenAI({ apiKey });
    this.models = [model, ...backupModels];
    this.config = config;
  }

  async complete(input: CompletionInput): Promise<CompletionOutput> {
    return runWithBackupModels(
      "GEMINI",
      this.models,
      (model) => this.completeWithModel(model, input),
      input.signal
    );
  }

  private async completeWithModel(
    model: string,
    input: CompletionInput
  ): Promise<CompletionOutput> {
    const config: GenerateContentConfig = {
      ...this.config,
      abortSignal: input.signal,
    };
    if (input.parameters?.maxOutputTokens !== undefined) {
      config.maxOutputTokens = input.parameters.maxOutputTokens;
    }
    if (input.parameters?.temperature !== undefined) {
      config.temperature = input.parameters.temperature;
    }

    const response = await this.genAI.models.generateContent({
      model,
      contents: input.prompt,
      config,
    });

    const text = response.text;
    if (!text) {
      throw new ExternalServiceError(
        "unavailable",
        `No text in Gemini ${model} response`,
        this.name
      );
    }

    return {
      text,
      metadata: {
        model,
        finishReason: response.candidates?.[0]?.finishReason,
        tokensUsed: response.usageMetadata?.totalTokenCount,
      },
    };
  }
}
