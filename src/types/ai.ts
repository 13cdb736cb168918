/**
 * Completion provider strategy types
 */

/**
 * Input for text completion
 */
export interface CompletionInput {
  /** The assembled prompt */
  prompt: string;
  /** Additional generation parameters */
  parameters?: {
    /** Maximum output tokens to generate */
    maxOutputTokens?: number;
    temperature?: number;
  };
  /** Abort signal for cancellation */
  signal?: AbortSignal;
}

/**
 * Output from text completion
 */
export interface CompletionOutput {
  text: string;
  metadata?: {
    /** Model used */
    model?: string;
    /** Tokens consumed */
    tokensUsed?: number;
    /** Finish reason */
    finishReason?: string;
    /** Additional provider-specific data */
    [key: string]: unknown;
  };
}

/**
 * Completion provider interface (strategy pattern).
 * Implementations reject with ExternalServiceError.
 */
export interface CompletionProvider {
  /** Provider name/identifier */
  readonly name: string;

  complete(input: CompletionInput): Promise<CompletionOutput>;
}
