/**
 * Turn request and response types
 */

import type { SerializedError } from "../utils/errors";
import type { DialogAction } from "./dialog";
import type { TranslationStatus } from "./language";

export interface TurnRequest {
  conversationId?: string;
  message: string;
  /** Language already known to the caller, e.g. from transcription */
  language?: string;
}

/**
 * Stages of one turn, in order
 */
export enum TurnStage {
  RECEIVED = "received",
  LANGUAGE_DETECTED = "language_detected",
  DIALOG_ADVANCED = "dialog_advanced",
  CONTEXT_RETRIEVED = "context_retrieved",
  PROMPT_ASSEMBLED = "prompt_assembled",
  GENERATED = "generated",
  TRANSLATED = "translated",
  COMMITTED = "committed",
}

/**
 * - ok: generated and committed
 * - degraded: generation failed after retries, canned reply committed
 * - declined: invalid input or session error, nothing changed
 * - failed: unrecoverable for this turn, apology returned, nothing changed
 * - cancelled: the caller aborted, nothing changed
 */
export type TurnStatus = "ok" | "degraded" | "declined" | "failed" | "cancelled";

export interface TurnMetadata {
  stepId?: string;
  mode?: string;
  stages: TurnStage[];
  actions: DialogAction[];
  translation?: TranslationStatus;
  untranslated: boolean;
  attempts: number;
  contextChunkIds: string[];
  /** Proverb appended to a free-form reply */
  proverbId?: string;
}

export interface TurnResponse {
  conversationId: string;
  response: string;
  language: string;
  sentiment: number;
  status: TurnStatus;
  error?: SerializedError;
  metadata: TurnMetadata;
}
