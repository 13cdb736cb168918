/**
 * DialogScript - validated, frozen step graph a conversation walks through
 */

import { z } from "zod";
import type {
  DialogScriptDefinition,
  LocalizedText,
  SlotDefinition,
  StepDefinition,
  TransitionCondition,
} from "../types/dialog";
import { referencedSlots } from "../utils/condition";
import { DialogScriptError } from "../utils/errors";
import { logger } from "../utils/logger";

const LocalizedTextSchema = z.union([
  z.string(),
  z.record(z.string(), z.string()),
]);

type JsonCondition =
  | { slots: string[] }
  | { intent: string }
  | JsonCondition[];

const JsonConditionSchema: z.ZodType<JsonCondition> = z.lazy(() =>
  z.union([
    z.object({ slots: z.array(z.string()) }).strict(),
    z.object({ intent: z.string() }).strict(),
    z.array(JsonConditionSchema),
  ])
);

/**
 * Shape of a script stored as JSON. Predicates only exist in code.
 */
const DialogScriptJsonSchema = z.object({
  name: z.string().min(1),
  entry: z.string().min(1),
  slots: z
    .record(
      z.string(),
      z.object({
        kind: z.enum(["count", "time", "text", "boolean"]),
        description: z.string().optional(),
      })
    )
    .optional(),
  steps: z.array(
    z.object({
      id: z.string().min(1),
      description: z.string().optional(),
      prompt: LocalizedTextSchema,
      requiredSlots: z.array(z.string()).optional(),
      transitions: z
        .array(z.object({ when: JsonConditionSchema, to: z.string() }))
        .optional(),
      fallback: z.string().optional(),
      terminal: z.boolean().optional(),
      cannedResponse: LocalizedTextSchema.optional(),
    })
  ),
  triggers: z.record(z.string(), z.array(z.string())).optional(),
  freeformPrompt: LocalizedTextSchema.optional(),
});

export class DialogScript {
  readonly name: string;
  readonly entry: string;
  readonly slots: Readonly<Record<string, SlotDefinition>>;
  readonly triggers?: Readonly<Record<string, readonly string[]>>;
  readonly freeformPrompt?: LocalizedText;
  private readonly steps: ReadonlyMap<string, StepDefinition>;

  private constructor(definition: DialogScriptDefinition) {
    this.name = definition.name;
    this.entry = definition.entry;
    this.slots = definition.slots ?? {};
    this.triggers = definition.triggers;
    this.freeformPrompt = definition.freeformPrompt;
    this.steps = new Map(definition.steps.map((step) => [step.id, step]));
  }

  /**
   * Validate a definition and freeze it. Every structural problem is
   * reported at once in a single DialogScriptError.
   */
  static load(definition: DialogScriptDefinition): DialogScript {
    const problems = validateDialogScript(definition);
    if (problems.length > 0) {
      throw new DialogScriptError(definition.name, problems);
    }

    const frozen = deepFreeze(copyDefinition(definition));
    logger.debug(
      `[DialogScript] Loaded "${frozen.name}" with ${frozen.steps.length} steps`
    );
    return new DialogScript(frozen);
  }

  get stepIds(): string[] {
    return [...this.steps.keys()];
  }

  getStep(stepId: string): StepDefinition | undefined {
    return this.steps.get(stepId);
  }

  /**
   * Step lookup for ids that come from session state
   */
  requireStep(stepId: string): StepDefinition {
    const step = this.steps.get(stepId);
    if (!step) {
      throw new DialogScriptError(this.name, [`Unknown step "${stepId}"`]);
    }
    return step;
  }

  /**
   * Declarations of the slots a step asks for or its transitions test.
   * Undeclared slots of a script without declarations are treated as free text.
   */
  slotDefinitions(stepId: string): Record<string, SlotDefinition> {
    const step = this.requireStep(stepId);
    const names = new Set([
      ...(step.requiredSlots ?? []),
      ...(step.transitions ?? []).flatMap((t) => referencedSlots(t.when)),
    ]);
    const definitions: Record<string, SlotDefinition> = {};
    for (const name of names) {
      definitions[name] = this.slots[name] ?? { kind: "text" };
    }
    return definitions;
  }

  get hasTriggers(): boolean {
    return Object.values(this.triggers ?? {}).some((words) => words.length > 0);
  }
}

export function loadDialogScript(
  definition: DialogScriptDefinition
): DialogScript {
  return DialogScript.load(definition);
}

/**
 * Parse a JSON script document and load it
 */
export function parseDialogScript(document: unknown): DialogScript {
  const result = DialogScriptJsonSchema.safeParse(document);
  if (!result.success) {
    const name =
      typeof document === "object" &&
      document !== null &&
      "name" in document &&
      typeof document.name === "string"
        ? document.name
        : "<unnamed>";
    throw new DialogScriptError(
      name,
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }
  return DialogScript.load(result.data);
}

/**
 * Structural problems of a script definition; empty when it is valid
 */
export function validateDialogScript(
  definition: DialogScriptDefinition
): string[] {
  const problems: string[] = [];
  const ids = new Set<string>();

  if (definition.steps.length === 0) {
    problems.push("Script has no steps");
  }

  for (const step of definition.steps) {
    if (ids.has(step.id)) {
      problems.push(`Duplicate step id "${step.id}"`);
    }
    ids.add(step.id);
  }

  if (!ids.has(definition.entry)) {
    problems.push(`Entry step "${definition.entry}" does not exist`);
  }

  const declared = definition.slots;
  for (const step of definition.steps) {
    for (const transition of step.transitions ?? []) {
      if (!ids.has(transition.to)) {
        problems.push(
          `Step "${step.id}" transitions to unknown step "${transition.to}"`
        );
      }
      if (declared) {
        for (const slot of referencedSlots(transition.when)) {
          if (!(slot in declared)) {
            problems.push(
              `Step "${step.id}" has a condition on undeclared slot "${slot}"`
            );
          }
        }
      }
    }

    if (step.fallback !== undefined && !ids.has(step.fallback)) {
      problems.push(
        `Step "${step.id}" falls back to unknown step "${step.fallback}"`
      );
    }

    if (declared) {
      for (const slot of step.requiredSlots ?? []) {
        if (!(slot in declared)) {
          problems.push(`Step "${step.id}" requires undeclared slot "${slot}"`);
        }
      }
    }
  }

  if (ids.has(definition.entry) && !terminalReachable(definition)) {
    problems.push(
      `No terminal step is reachable from entry "${definition.entry}"`
    );
  }

  return problems;
}

function terminalReachable(definition: DialogScriptDefinition): boolean {
  const byId = new Map(definition.steps.map((step) => [step.id, step]));
  const visited = new Set<string>([definition.entry]);
  const queue = [definition.entry];

  while (queue.length > 0) {
    const id = queue.shift();
    const step = id === undefined ? undefined : byId.get(id);
    if (!step) {
      continue;
    }
    if (step.terminal) {
      return true;
    }

    const targets = (step.transitions ?? []).map((t) => t.to);
    if (step.fallback !== undefined) {
      targets.push(step.fallback);
    }
    for (const target of targets) {
      if (!visited.has(target)) {
        visited.add(target);
        queue.push(target);
      }
    }
  }

  return false;
}

/**
 * Copy the containers of a definition so freezing never touches the
 * caller's objects. Predicates are shared.
 */
function copyDefinition(
  definition: DialogScriptDefinition
): DialogScriptDefinition {
  return {
    ...definition,
    slots: definition.slots
      ? Object.fromEntries(
          Object.entries(definition.slots).map(([name, slot]) => [
            name,
            { ...slot },
          ])
        )
      : undefined,
    triggers: definition.triggers
      ? Object.fromEntries(
          Object.entries(definition.triggers).map(([lang, words]) => [
            lang,
            [...words],
          ])
        )
      : undefined,
    freeformPrompt:
      definition.freeformPrompt === undefined
        ? undefined
        : copyText(definition.freeformPrompt),
    steps: definition.steps.map(
      (step): StepDefinition => ({
        ...step,
        prompt: copyText(step.prompt),
        cannedResponse:
          step.cannedResponse === undefined
            ? undefined
            : copyText(step.cannedResponse),
        requiredSlots: step.requiredSlots ? [...step.requiredSlots] : undefined,
        transitions: step.transitions?.map((transition) => ({
          when: copyCondition(transition.when),
          to: transition.to,
        })),
      })
    ),
  };
}

function copyText(text: LocalizedText): LocalizedText {
  return typeof text === "string" ? text : { ...text };
}

function copyCondition(condition: TransitionCondition): TransitionCondition {
  if (Array.isArray(condition)) {
    return condition.map((member) => copyCondition(member));
  }
  if (typeof condition === "function") {
    return condition;
  }
  return "slots" in condition
    ? { slots: [...condition.slots] }
    : { intent: condition.intent };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
  }
  return value;
}
