/**
 * Dialog script types
 */

/**
 * Text that is either language independent or keyed by language code
 */
export type LocalizedText = string | Record<string, string>;

export type SlotValue = string | number | boolean;

/**
 * How a slot value is recognised in user input
 */
export type SlotKind = "count" | "time" | "text" | "boolean";

export interface SlotDefinition {
  kind: SlotKind;
  description?: string;
}

/**
 * Result of the slot-extraction collaborator for one user input
 */
export interface SlotExtraction {
  slots: Record<string, SlotValue>;
  /** Recognised intent, e.g. "affirm" or "deny" */
  intent?: string;
}

/**
 * Values a transition predicate is evaluated against
 */
export interface TransitionContext {
  /** Session slots merged with the extracted values */
  slots: Readonly<Record<string, SlotValue>>;
  extraction: SlotExtraction;
  input: string;
  language: string;
}

export type TransitionPredicate = (context: TransitionContext) => boolean;

/**
 * Condition guarding a transition.
 * - `{ slots }` matches when every named slot has a value
 * - `{ intent }` matches when the extractor recognised that intent
 * - a predicate is evaluated programmatically
 * - an array matches when all of its members match
 */
export type TransitionCondition =
  | { slots: string[] }
  | { intent: string }
  | TransitionPredicate
  | TransitionCondition[];

export interface TransitionSpec {
  when: TransitionCondition;
  to: string;
}

export interface StepDefinition {
  id: string;
  description?: string;
  /** Prompt template; {{slot}} placeholders are substituted */
  prompt: LocalizedText;
  requiredSlots?: string[];
  /** Evaluated in declaration order */
  transitions?: TransitionSpec[];
  /** Target used when no transition matches */
  fallback?: string;
  terminal?: boolean;
  /** Reply used when generation is unavailable; defaults to the rendered prompt */
  cannedResponse?: LocalizedText;
}

export interface DialogScriptDefinition {
  name: string;
  entry: string;
  slots?: Record<string, SlotDefinition>;
  steps: StepDefinition[];
  /** Words that start the script, per language. No triggers: always scripted. */
  triggers?: Record<string, string[]>;
  /** Instruction used in place of a step prompt once the script handed off */
  freeformPrompt?: LocalizedText;
}

/**
 * Side effects requested by the dialog engine
 */
export type DialogAction =
  | { type: "transition"; from: string; to: string; via: "condition" | "fallback" }
  | { type: "clarify"; stepId: string; missingSlots: string[] }
  | { type: "handoff"; stepId: string };

export interface DialogOutcome {
  nextStepId: string;
  slotUpdates: Record<string, SlotValue>;
  actions: DialogAction[];
  extraction: SlotExtraction;
}

/**
 * Pluggable slot and intent extraction
 */
export interface SlotExtractor {
  readonly name: string;
  extract(input: string, request: SlotExtractionRequest): Promise<SlotExtraction>;
}

export interface SlotExtractionRequest {
  stepId: string;
  /** Slots the current step asks for, with their declared kinds */
  slots: Record<string, SlotDefinition>;
  language: string;
  signal?: AbortSignal;
}
