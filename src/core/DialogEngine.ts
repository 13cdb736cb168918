/**
 * DialogEngine - walks a DialogScript one user input at a time
 *
 * Slot extraction is delegated to a SlotExtractor; transition choice is a
 * pure function of the current step, the slots and the extraction.
 */

import type {
  DialogAction,
  DialogOutcome,
  SlotExtraction,
  SlotExtractor,
  SlotValue,
  StepDefinition,
} from "../types/dialog";
import type { SessionState } from "../types/session";
import { ConditionEvaluator, hasSlotValue } from "../utils/condition";
import { getErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { throwIfAborted, withTimeout } from "../utils/retry";
import { containsPhrase, normalizeWords } from "../utils/text";
import { localize, renderTemplate } from "../utils/template";
import type { DialogScript } from "./DialogScript";

export interface AdvanceOptions {
  /** Language the input is written in */
  language?: string;
  signal?: AbortSignal;
}

export interface DialogEngineOptions {
  /** Bound on one extraction call, default 10s */
  extractionTimeoutMs?: number;
}

export interface DecideContext {
  input?: string;
  language?: string;
}

export class DialogEngine {
  constructor(
    readonly script: DialogScript,
    private readonly extractor: SlotExtractor,
    private readonly options: DialogEngineOptions = {}
  ) {}

  /**
   * Extract slots from the input and pick the next step. The session is
   * only read.
   */
  async advance(
    session: Readonly<SessionState>,
    input: string,
    options: AdvanceOptions = {}
  ): Promise<DialogOutcome> {
    const language = options.language ?? session.language;
    const extraction = await this.extract(
      session.currentStep,
      input,
      language,
      options.signal
    );
    return this.decide(session.currentStep, session.slots, extraction, {
      input,
      language,
    });
  }

  /**
   * Pure transition choice:
   * first matching transition, else the fallback, else stay and clarify.
   */
  decide(
    stepId: string,
    slots: Readonly<Record<string, SlotValue>>,
    extraction: SlotExtraction,
    context: DecideContext = {}
  ): DialogOutcome {
    const step = this.script.requireStep(stepId);
    const slotUpdates = this.acceptedSlots(step, extraction);
    const merged = { ...slots, ...slotUpdates };
    const actions: DialogAction[] = [];

    if (step.terminal) {
      return { nextStepId: step.id, slotUpdates, actions, extraction };
    }

    const evaluator = new ConditionEvaluator({
      slots: merged,
      extraction,
      input: context.input ?? "",
      language: context.language ?? "en",
    });

    let nextStepId: string | undefined;
    for (const transition of step.transitions ?? []) {
      const evaluation = evaluator.evaluate(transition.when);
      logger.debug(
        `[DialogEngine] ${step.id} -> ${transition.to}: ${evaluation.details.join("; ")}`
      );
      if (evaluation.matched) {
        nextStepId = transition.to;
        actions.push({
          type: "transition",
          from: step.id,
          to: transition.to,
          via: "condition",
        });
        break;
      }
    }

    if (nextStepId === undefined && step.fallback !== undefined) {
      nextStepId = step.fallback;
      actions.push({
        type: "transition",
        from: step.id,
        to: step.fallback,
        via: "fallback",
      });
    }

    if (nextStepId === undefined) {
      actions.push({
        type: "clarify",
        stepId: step.id,
        missingSlots: (step.requiredSlots ?? []).filter(
          (name) => !hasSlotValue(merged, name)
        ),
      });
      return { nextStepId: step.id, slotUpdates, actions, extraction };
    }

    if (this.script.requireStep(nextStepId).terminal) {
      actions.push({ type: "handoff", stepId: nextStepId });
    }

    return { nextStepId, slotUpdates, actions, extraction };
  }

  /**
   * Whether a message starts the script for a session waiting on a trigger.
   * Scripts without trigger words always engage.
   */
  shouldEngage(session: Readonly<SessionState>, input: string): boolean {
    if (session.mode !== "awaiting_trigger" || !this.script.hasTriggers) {
      return true;
    }
    const normalized = normalizeWords(input);
    const triggers = Object.values(this.script.triggers ?? {}).flat();
    return triggers.some((trigger) =>
      containsPhrase(normalized, normalizeWords(trigger))
    );
  }

  /**
   * Step prompt for a language with slot values substituted
   */
  renderStep(
    stepId: string,
    slots: Readonly<Record<string, SlotValue>>,
    language: string
  ): string {
    const step = this.script.requireStep(stepId);
    return renderTemplate(localize(step.prompt, language), slots);
  }

  /**
   * Reply used when generation is unavailable
   */
  cannedResponse(
    stepId: string,
    slots: Readonly<Record<string, SlotValue>>,
    language: string
  ): string {
    const step = this.script.requireStep(stepId);
    return renderTemplate(
      localize(step.cannedResponse ?? step.prompt, language),
      slots
    );
  }

  /**
   * Instruction used in place of a step prompt outside scripted mode
   */
  freeformInstruction(language: string): string {
    return this.script.freeformPrompt === undefined
      ? ""
      : localize(this.script.freeformPrompt, language);
  }

  private async extract(
    stepId: string,
    input: string,
    language: string,
    signal?: AbortSignal
  ): Promise<SlotExtraction> {
    throwIfAborted(signal);
    try {
      return await withTimeout(
        (timeoutSignal) =>
          this.extractor.extract(input, {
            stepId,
            slots: this.script.slotDefinitions(stepId),
            language,
            signal: timeoutSignal,
          }),
        this.options.extractionTimeoutMs ?? 10 * 1000,
        `extract:${this.extractor.name}`,
        signal
      );
    } catch (error) {
      throwIfAborted(signal);
      logger.warn(
        `[DialogEngine] Slot extraction with ${this.extractor.name} failed: ${getErrorMessage(error)}`
      );
      return { slots: {} };
    }
  }

  /**
   * Extracted values for slots the step asks for or the script declares
   */
  private acceptedSlots(
    step: StepDefinition,
    extraction: SlotExtraction
  ): Record<string, SlotValue> {
    const requested = new Set(step.requiredSlots ?? []);
    const accepted: Record<string, SlotValue> = {};
    for (const [name, value] of Object.entries(extraction.slots)) {
      if (requested.has(name) || name in this.script.slots) {
        accepted[name] = value;
      }
    }
    return accepted;
  }
}
