/**
 * Gemini embeddings
 */

import { GoogleGenAI } from "@google/genai";

import type { Embedder } from "../types/retrieval";
import { ExternalServiceError, toExternalServiceError } from "../utils/errors";

export interface GeminiEmbedderOptions {
  apiKey: string;
  /** Default "text-embedding-004" */
  model?: string;
  dimensions?: number;
  client?: GoogleGenAI;
}

export class GeminiEmbedder implements Embedder {
  public readonly name = "gemini";
  readonly dimensions?: number;
  private genAI: GoogleGenAI;
  private model: string;

  constructor(options: GeminiEmbedderOptions) {
    if (!options.apiKey && !options.client) {
      throw new Error("Gemini API key is required");
    }
    this.genAI = options.client ?? new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model ?? "text-embedding-004";
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
      const response = await this.genAI.models.embedContent({
        model: this.model,
        contents: texts,
        config: {
          outputDimensionality: this.dimensions,
          abortSignal: signal,
        },
      });
      const vectors = (response.embeddings ?? []).map(
        (embedding) => embedding.values ?? []
      );
      if (vectors.length !== texts.length) {
        throw new ExternalServiceError(
          "unavailable",
          `Gemini returned ${vectors.length} embeddings for ${texts.length} texts`,
          this.name
        );
      }
      return vectors;
    } catch (error) {
      throw toExternalServiceError(error, this.name);
    }
  }
}
