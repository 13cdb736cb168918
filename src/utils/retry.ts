/**
 * Retry utility with exponential backoff
 */

import { ExternalServiceError, TurnAbortedError } from "./errors";

export interface RetryOptions<T> {
  operation: (attempt: number) => Promise<T>;
  maxRetries: number;
  delay: (attempt: number) => number;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  signal?: AbortSignal;
}

export async function retry<T>(options: RetryOptions<T>): Promise<T> {
  const { operation, maxRetries, delay, shouldRetry, onRetry, signal } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    throwIfAborted(signal);
    try {
      return await operation(attempt);
    } catch (error: unknown) {
      lastError = error;

      if (error instanceof TurnAbortedError) {
        throw error;
      }

      if (attempt === maxRetries || (shouldRetry && !shouldRetry(error))) {
        throw lastError;
      }

      const delayMs = delay(attempt);
      if (onRetry) {
        onRetry(attempt, lastError, delayMs);
      }

      await sleep(delayMs, signal);
    }
  }

  // eslint-disable-next-line @typescript-eslint/only-throw-error
  throw lastError ?? new Error("Operation failed");
}

/**
 * Exponential backoff: base * 2^attempt, capped
 */
export function exponentialBackoff(
  baseMs: number,
  maxMs: number
): (attempt: number) => number {
  return (attempt: number) => Math.min(baseMs * Math.pow(2, attempt), maxMs);
}

/**
 * Run an abortable operation with a deadline. The operation receives a signal
 * that fires on timeout or when the caller's signal aborts.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operationName: string,
  parentSignal?: AbortSignal
): Promise<T> {
  throwIfAborted(parentSignal);

  const controller = new AbortController();
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onParentAbort = () => controller.abort();
  parentSignal?.addEventListener("abort", onParentAbort, { once: true });

  try {
    return await Promise.race([
      operation(controller.signal),
      new Promise<never>((_, reject) => {
        controller.signal.addEventListener(
          "abort",
          () => {
            reject(
              timedOut
                ? new ExternalServiceError(
                    "timeout",
                    `${operationName} timed out after ${timeoutMs}ms`,
                    operationName
                  )
                : new TurnAbortedError()
            );
          },
          { once: true }
        );
      }),
    ]);
  } finally {
    clearTimeout(timeoutId);
    parentSignal?.removeEventListener("abort", onParentAbort);
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new TurnAbortedError();
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new TurnAbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new TurnAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
