/**
 * OpenAI embeddings
 */

import OpenAI from "openai";

import type { Embedder } from "../types/retrieval";
import { toExternalServiceError } from "../utils/errors";

export interface OpenAIEmbedderOptions {
  apiKey: string;
  /** Default "text-embedding-3-small" */
  model?: string;
  dimensions?: number;
  client?: OpenAI;
}

export class OpenAIEmbedder implements Embedder {
  public readonly name = "openai";
  readonly dimensions?: number;
  private client: OpenAI;
  private model: string;

  constructor(options: OpenAIEmbedderOptions) {
    if (!options.apiKey && !options.client) {
      throw new Error("OpenAI API key is required");
    }
    this.client =
      options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model ?? "text-embedding-3-small";
    this.dimensions = options.dimensions;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], signal);
    return embedding;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: texts,
          dimensions: this.dimensions,
        },
        { signal }
      );
      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
    } catch (error) {
      throw toExternalServiceError(error, this.name);
    }
  }
}
