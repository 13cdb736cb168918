/**
 * Primary-then-backup model fallback shared by the completion providers
 */

import {
  ExternalServiceError,
  TurnAbortedError,
  toExternalServiceError,
} from "../utils/errors";
import { logger } from "../utils/logger";

/**
 * Credential problems fail the same way on every model
 */
export function shouldUseBackupModel(error: ExternalServiceError): boolean {
  return error.kind !== "auth";
}

/**
 * Run `attempt` with the primary model, then with each backup model while the
 * failure qualifies. Rejects with the last ExternalServiceError.
 */
export async function runWithBackupModels<T>(
  label: string,
  models: readonly string[],
  attempt: (model: string) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  let lastError: ExternalServiceError | undefined;

  for (let i = 0; i < models.length; i++) {
    const model = models[i];
    if (i > 0) {
      logger.debug(
        `[${label}] Trying backup model ${i}/${models.length - 1}: ${model}`
      );
    }

    try {
      return await attempt(model);
    } catch (error: unknown) {
      if (signal?.aborted) {
        throw new TurnAbortedError();
      }
      lastError = toExternalServiceError(error, label.toLowerCase());
      logger.warn(
        `[${label}] Model ${model} failed (${lastError.kind}): ${lastError.message}`
      );
      if (!shouldUseBackupModel(lastError)) {
        throw lastError;
      }
    }
  }

  if (lastError) {
    logger.error(`[${label}] All models failed`);
    throw lastError;
  }
  throw new ExternalServiceError(
    "unavailable",
    "No model configured",
    label.toLowerCase()
  );
}
