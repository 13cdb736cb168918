/**
 * Anthropic completion provider with backup models
 */

import Anthropic from "@anthropic-ai/sdk";
import type { MessageCreateParamsNonStreaming } from "@anthropic-ai/sdk/resources/messages";

import type {
  CompletionInput,
  CompletionOutput,
  CompletionProvider,
} from "../types/ai";
import { ExternalServiceError } from "../utils/errors";
import { runWithBackupModels } from "./backup";

const DEFAULT_MAX_TOKENS = 1024;

export interface AnthropicProviderOptions {
  apiKey: string;
  /** e.g. "claude-3-5-haiku-latest" */
  model: string;
  backupModels?: string[];
  config?: Partial<Omit<MessageCreateParamsNonStreaming, "model" | "messages">>;
  client?: Anthropic;
}

export class AnthropicProvider implements CompletionProvider {
  public readonly name = "anthropic";
  private client: Anthropic;
  private models: string[];
  private config?: AnthropicProviderOptions["config"];

  constructor(options: AnthropicProviderOptions) {
    const { apiKey, model, backupModels = [], config } = options;

    if (!apiKey && !options.client) {
      throw new Error("Anthropic API key is required");
    }
    if (!model) {
      throw new Error("Model is required. Example: 'claude-3-5-haiku-latest'");
    }

    this.client = options.client ?? new Anthropic({ apiKey, maxRetries: 0 });
    this.models = [model, ...backupModels];
    this.config = config;
  }

  async complete(input: CompletionInput): Promise<CompletionOutput> {
    return runWithBackupModels(
      "ANTHROPIC",
      this.models,
      (model) => this.completeWithModel(model, input),
      input.signal
    );
  }

  private async completeWithModel(
    model: string,
    input: CompletionInput
  ): Promise<CompletionOutput> {
    const params: MessageCreateParamsNonStreaming = {
      max_tokens: DEFAULT_MAX_TOKENS,
      ...this.config,
      model,
      messages: [{ role: "user", content: input.prompt }],
    };
    if (input.parameters?.maxOutputTokens !== undefined) {
      params.max_tokens = input.parameters.maxOutputTokens;
    }
    if (input.parameters?.temperature !== undefined) {
      // Anthropic accepts 0..1
      params.temperature = Math.min(1, input.parameters.temperature);
    }

    const response = await this.client.messages.create(params, {
      signal: input.signal,
    });

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
    if (!text) {
      throw new ExternalServiceError(
        "unavailable",
        `No text in Anthropic ${model} response`,
        this.name
      );
    }

    return {
      text,
      metadata: {
        model: response.model,
        finishReason: response.stop_reason ?? undefined,
        tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
      },
    };
  }
}
