/**
 * Session state tracked between turns of one conversation
 */

import type { SlotValue } from "./dialog";

export type Speaker = "user" | "assistant";

/**
 * One entry of the append-only conversation history
 */
export interface Turn {
  speaker: Speaker;
  text: string;
  /** Epoch milliseconds */
  timestamp: number;
  /** Dialog step the turn was produced in */
  stepId?: string;
}

/**
 * How the coordinator drives the conversation
 * - awaiting_trigger: the script has trigger words and none was seen yet
 * - scripted: the dialog script decides the next step
 * - freeform: a terminal step was reached, generation is retrieval-augmented only
 */
export type DialogMode = "awaiting_trigger" | "scripted" | "freeform";

export interface SessionState {
  /** Unique, immutable conversation identifier */
  readonly conversationId: string;

  /** Id of a step in the active dialog script */
  currentStep: string;

  /** Slot values collected so far */
  slots: Record<string, SlotValue>;

  /** Full conversation; appended to, never truncated */
  history: Turn[];

  /** Detected or pinned ISO 639-1 language code */
  language: string;

  mode: DialogMode;

  /** One sentiment score per user turn, oldest first */
  sentimentTrail: number[];

  turnCount: number;

  /** Epoch milliseconds */
  createdAt: number;

  /** Epoch milliseconds of the last committed turn */
  lastActive: number;
}
