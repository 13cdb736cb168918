/**
 * Utility functions and helpers
 */

export { LoggerLevel, logger, configureLogger } from "./logger";

export type { RetryOptions } from "./retry";
export {
  retry,
  exponentialBackoff,
  withTimeout,
  throwIfAborted,
} from "./retry";

export type { ErrorCode, ExternalServiceErrorKind, SerializedError } from "./errors";
export {
  ConversaError,
  ValidationError,
  SessionNotFoundError,
  SessionBusyError,
  ExternalServiceError,
  DialogScriptError,
  PromptTooLargeError,
  TurnAbortedError,
  InternalError,
  getErrorMessage,
  toExternalServiceError,
} from "./errors";

export { renderTemplate, templateVariables, localize } from "./template";

export { ConditionEvaluator, hasSlotValue, referencedSlots } from "./condition";
export type { ConditionEvaluation } from "./condition";

export { createConversationId, generateChunkId } from "./id";
export { cloneSession, windowHistory } from "./session";
export { cosineSimilarity } from "./similarity";
export { estimateTokens } from "./tokens";
export { normalizeWords, containsPhrase, sanitizeMessage } from "./text";
export { parseJSONResponse } from "./json";
