/**
 * Error taxonomy for the orchestration engine
 */

export type ErrorCode =
  | "validation_error"
  | "session_not_found"
  | "session_busy"
  | "external_service_error"
  | "dialog_script_error"
  | "prompt_too_large"
  | "turn_aborted"
  | "internal_error";

/**
 * Transient or permanent failure categories reported by external collaborators
 */
export type ExternalServiceErrorKind =
  | "timeout"
  | "rate_limited"
  | "unavailable"
  | "auth";

export interface SerializedError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base class for every error raised by the engine
 */
export abstract class ConversaError extends Error {
  abstract readonly code: ErrorCode;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Malformed turn input, rejected at the boundary
 */
export class ValidationError extends ConversaError {
  readonly code = "validation_error";
}

export class SessionNotFoundError extends ConversaError {
  readonly code = "session_not_found";

  constructor(public readonly conversationId: string) {
    super(`Session '${conversationId}' does not exist`, { conversationId });
  }
}

/**
 * Lock contention: another turn for the same conversation held the lock
 * for longer than the configured wait
 */
export class SessionBusyError extends ConversaError {
  readonly code = "session_busy";

  constructor(
    public readonly conversationId: string,
    public readonly waitedMs: number
  ) {
    super(
      `Session '${conversationId}' is busy (waited ${waitedMs}ms for the lock)`,
      { conversationId, waitedMs }
    );
  }
}

export class ExternalServiceError extends ConversaError {
  readonly code = "external_service_error";

  constructor(
    public readonly kind: ExternalServiceErrorKind,
    message: string,
    public readonly service?: string,
    public readonly cause?: unknown
  ) {
    super(message, { kind, ...(service && { service }) });
  }

  /** Timeouts and rate limits are worth another attempt */
  get transient(): boolean {
    return this.kind === "timeout" || this.kind === "rate_limited";
  }

  static isExternalServiceError(error: unknown): error is ExternalServiceError {
    return error instanceof ExternalServiceError;
  }
}

/**
 * Malformed or unreachable dialog graph. Raised while loading a script.
 */
export class DialogScriptError extends ConversaError {
  readonly code = "dialog_script_error";

  constructor(
    public readonly scriptName: string,
    public readonly problems: string[]
  ) {
    super(
      `Dialog script '${scriptName}' is invalid: ${problems.join("; ")}`,
      { scriptName, problems }
    );
  }
}

export class PromptTooLargeError extends ConversaError {
  readonly code = "prompt_too_large";

  constructor(
    public readonly requiredTokens: number,
    public readonly budgetTokens: number
  ) {
    super(
      `Persona and step prompt need ${requiredTokens} tokens, budget is ${budgetTokens}`,
      { requiredTokens, budgetTokens }
    );
  }
}

/**
 * The caller went away; nothing was committed
 */
export class TurnAbortedError extends ConversaError {
  readonly code = "turn_aborted";

  constructor(message = "Turn was aborted by the caller") {
    super(message);
  }
}

/**
 * Anything unexpected, wrapped so it can be reported
 */
export class InternalError extends ConversaError {
  readonly code = "internal_error";

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
  }
}

/**
 * Type guard for errors with status/code properties
 */
interface ErrorWithStatus {
  status?: number;
  code?: string | number;
  message?: string;
  name?: string;
}

function isErrorWithStatus(error: unknown): error is ErrorWithStatus {
  return (
    typeof error === "object" &&
    error !== null &&
    ("status" in error || "code" in error || "message" in error)
  );
}

/**
 * Safely extract error message
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (isErrorWithStatus(error) && error.message) {
    return error.message;
  }
  return String(error);
}

/**
 * Map an SDK or network failure onto the external-service taxonomy.
 * Already-classified errors pass through unchanged.
 */
export function toExternalServiceError(
  error: unknown,
  service: string
): ExternalServiceError {
  if (error instanceof ExternalServiceError) {
    return error;
  }

  const message = getErrorMessage(error);

  if (isErrorWithStatus(error)) {
    const { status, name } = error;

    if (status === 429 || error.code === "rate_limit_exceeded") {
      return new ExternalServiceError("rate_limited", message, service, error);
    }
    if (status === 401 || status === 403) {
      return new ExternalServiceError("auth", message, service, error);
    }
    if (
      status === 408 ||
      name === "APIConnectionTimeoutError" ||
      name === "TimeoutError" ||
      error.code === "ETIMEDOUT"
    ) {
      return new ExternalServiceError("timeout", message, service, error);
    }
  }

  if (/timed? ?out/i.test(message)) {
    return new ExternalServiceError("timeout", message, service, error);
  }

  return new ExternalServiceError("unavailable", message, service, error);
}
