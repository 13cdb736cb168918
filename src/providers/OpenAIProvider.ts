/**
 * OpenAI completion provider with backup models
 */

import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";

import type {
  CompletionInput,
  CompletionOutput,
  CompletionProvider,
} from "../types/ai";
import { ExternalServiceError } from "../utils/errors";
import { runWithBackupModels } from "./backup";

export interface OpenAIProviderOptions {
  apiKey: string;
  organization?: string;
  /** e.g. "gpt-4o-mini" */
  model: string;
  /** Tried in order when the primary model fails */
  backupModels?: string[];
  /** Default request parameters */
  config?: Partial<
    Omit<ChatCompletionCreateParamsNonStreaming, "model" | "messages">
  >;
  /** Injected client, for tests and custom transports */
  client?: OpenAI;
}

export class OpenAIProvider implements CompletionProvider {
  public readonly name = "openai";
  private client: OpenAI;
  private models: string[];
  private config?: OpenAIProviderOptions["config"];

  constructor(options: OpenAIProviderOptions) {
    const { apiKey, organization, model, backupModels = [], config } = options;

    if (!apiKey && !options.client) {
      throw new Error("OpenAI API key is required");
    }
    if (!model) {
      throw new Error("Model is required. Example: 'gpt-4o-mini'");
    }

    // Retries happen in the coordinator, not in the SDK
    this.client = options.client ?? new OpenAI({ apiKey, organization, maxRetries: 0 });
    this.models = [model, ...backupModels];
    this.config = config;
  }

  async complete(input: CompletionInput): Promise<CompletionOutput> {
    return runWithBackupModels(
      "OPENAI",
      this.models,
      (model) => this.completeWithModel(model, input),
      input.signal
    );
  }

  private async completeWithModel(
    model: string,
    input: CompletionInput
  ): Promise<CompletionOutput> {
    const params: ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: [{ role: "user", content: input.prompt }],
      ...this.config,
    };
    if (input.parameters?.maxOutputTokens !== undefined) {
      params.max_tokens = input.parameters.maxOutputTokens;
    }
    if (input.parameters?.temperature !== undefined) {
      params.temperature = input.parameters.temperature;
    }

    const response = await this.client.chat.completions.create(params, {
      signal: input.signal,
    });

    const text = response.choices[0]?.message?.content;
    if (!text) {
      throw new ExternalServiceError(
        "unavailable",
        `No response from OpenAI ${model}`,
        this.name
      );
    }

    return {
      text,
      metadata: {
        model: response.model,
        finishReason: response.choices[0]?.finish_reason,
        tokensUsed: response.usage?.total_tokens,
      },
    };
  }
}
