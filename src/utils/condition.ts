import type {
  TransitionCondition,
  TransitionContext,
} from "../types/dialog";
import { getErrorMessage } from "./errors";
import { logger } from "./logger";

export interface ConditionEvaluation {
  matched: boolean;
  /** Human-readable trace of what was evaluated */
  details: string[];
}

/**
 * Evaluates transition conditions against the extracted slots and intent.
 * Arrays use AND logic; predicates that throw count as not matched.
 */
export class ConditionEvaluator {
  constructor(private readonly context: TransitionContext) {}

  evaluate(condition: TransitionCondition): ConditionEvaluation {
    const details: string[] = [];
    const matched = this.evaluateInto(condition, details);
    return { matched, details };
  }

  private evaluateInto(
    condition: TransitionCondition,
    details: string[]
  ): boolean {
    if (Array.isArray(condition)) {
      details.push(`all of ${condition.length}`);
      return condition.every((member) => this.evaluateInto(member, details));
    }

    if (typeof condition === "function") {
      try {
        const result = Boolean(condition(this.context));
        details.push(`predicate -> ${result}`);
        return result;
      } catch (error) {
        logger.warn(
          `[ConditionEvaluator] Predicate failed: ${getErrorMessage(error)}`
        );
        details.push("predicate -> error");
        return false;
      }
    }

    if ("slots" in condition) {
      const missing = condition.slots.filter(
        (name) => !hasSlotValue(this.context.slots, name)
      );
      details.push(
        missing.length === 0
          ? `slots [${condition.slots.join(", ")}] filled`
          : `slots missing [${missing.join(", ")}]`
      );
      return missing.length === 0;
    }

    const result = this.context.extraction.intent === condition.intent;
    details.push(`intent ${condition.intent} -> ${result}`);
    return result;
  }
}

export function hasSlotValue(
  slots: Readonly<Record<string, unknown>>,
  name: string
): boolean {
  const value = slots[name];
  return value !== undefined && value !== null && value !== "";
}

/**
 * Slot names a condition refers to, for script validation
 */
export function referencedSlots(condition: TransitionCondition): string[] {
  if (Array.isArray(condition)) {
    return condition.flatMap((member) => referencedSlots(member));
  }
  if (typeof condition === "function" || !("slots" in condition)) {
    return [];
  }
  return condition.slots;
}
