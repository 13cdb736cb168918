/**
 * DialogScript Tests
 *
 * Eager validation of the step graph and immutability of loaded scripts
 */
import { describe, expect, test } from "vitest";
import {
  DialogScript,
  DialogScriptError,
  loadRestaurantBookingScript,
  parseDialogScript,
  validateDialogScript,
  type DialogScriptDefinition,
} from "../src/index";

function definition(
  overrides: Partial<DialogScriptDefinition> = {}
): DialogScriptDefinition {
  return {
    name: "booking",
    entry: "Ask",
    slots: { party_size: { kind: "count" } },
    steps: [
      {
        id: "Ask",
        prompt: "Ask for the party size",
        requiredSlots: ["party_size"],
        transitions: [{ when: { slots: ["party_size"] }, to: "Done" }],
      },
      { id: "Done", prompt: "Thank them", terminal: true },
    ],
    ...overrides,
  };
}

describe("validateDialogScript", () => {
  test("should accept a well-formed script", () => {
    expect(validateDialogScript(definition())).toEqual([]);
  });

  test("should report transitions to unknown steps", () => {
    const problems = validateDialogScript(
      definition({
        steps: [
          {
            id: "Ask",
            prompt: "Ask",
            transitions: [{ when: { intent: "affirm" }, to: "Nowhere" }],
            fallback: "Missing",
          },
          { id: "Done", prompt: "Done", terminal: true },
        ],
      })
    );

    expect(problems).toContain('Step "Ask" transitions to unknown step "Nowhere"');
    expect(problems).toContain('Step "Ask" falls back to unknown step "Missing"');
  });

  test("should report duplicate ids and a missing entry", () => {
    const problems = validateDialogScript(
      definition({
        entry: "Start",
        steps: [
          { id: "Done", prompt: "Done", terminal: true },
          { id: "Done", prompt: "Again", terminal: true },
        ],
      })
    );

    expect(problems).toEqual([
      'Duplicate step id "Done"',
      'Entry step "Start" does not exist',
    ]);
  });

  test("should report an unreachable terminal step", () => {
    const problems = validateDialogScript(
      definition({
        steps: [
          { id: "Ask", prompt: "Ask", fallback: "Loop" },
          { id: "Loop", prompt: "Loop", fallback: "Ask" },
          { id: "Done", prompt: "Done", terminal: true },
        ],
      })
    );

    expect(problems).toEqual(['No terminal step is reachable from entry "Ask"']);
  });

  test("should report undeclared slots", () => {
    const problems = validateDialogScript(
      definition({
        steps: [
          {
            id: "Ask",
            prompt: "Ask",
            requiredSlots: ["time"],
            transitions: [{ when: [{ slots: ["party_size", "date"] }], to: "Done" }],
          },
          { id: "Done", prompt: "Done", terminal: true },
        ],
      })
    );

    expect(problems).toEqual([
      'Step "Ask" has a condition on undeclared slot "date"',
      'Step "Ask" requires undeclared slot "time"',
    ]);
  });

  test("should report an empty script", () => {
    expect(validateDialogScript(definition({ steps: [] }))).toEqual([
      "Script has no steps",
      'Entry step "Ask" does not exist',
    ]);
  });
});

describe("DialogScript.load", () => {
  test("should throw a DialogScriptError listing every problem", () => {
    const load = () =>
      DialogScript.load(
        definition({
          steps: [
            {
              id: "Ask",
              prompt: "Ask",
              transitions: [{ when: { intent: "affirm" }, to: "Nowhere" }],
            },
          ],
        })
      );

    expect(load).toThrow(DialogScriptError);
    try {
      load();
    } catch (error) {
      expect(error instanceof DialogScriptError && error.problems).toEqual([
        'Step "Ask" transitions to unknown step "Nowhere"',
        'No terminal step is reachable from entry "Ask"',
      ]);
    }
  });

  test("should freeze the loaded graph without freezing the input", () => {
    const input = definition();
    const script = DialogScript.load(input);

    const step = script.requireStep("Ask");
    expect(Object.isFrozen(step)).toBe(true);
    expect(Object.isFrozen(step.requiredSlots)).toBe(true);
    expect(Object.isFrozen(input.steps[0])).toBe(false);

    input.steps[0].prompt = "Changed";
    expect(script.requireStep("Ask").prompt).toBe("Ask for the party size");
  });

  test("should describe slots for a step", () => {
    const script = DialogScript.load(definition({ slots: undefined }));

    expect(script.slotDefinitions("Ask")).toEqual({ party_size: { kind: "text" } });
    expect(script.stepIds).toEqual(["Ask", "Done"]);
    expect(script.hasTriggers).toBe(false);
  });

  test("should throw for unknown steps", () => {
    const script = DialogScript.load(definition());

    expect(script.getStep("Nope")).toBeUndefined();
    expect(() => script.requireStep("Nope")).toThrow(DialogScriptError);
  });
});

describe("parseDialogScript", () => {
  test("should load the bundled booking script", () => {
    const script = loadRestaurantBookingScript();

    expect(script.name).toBe("restaurant_booking");
    expect(script.entry).toBe("Greeting");
    expect(script.stepIds).toEqual(["Greeting", "CollectTime", "Confirm", "Booked"]);
    expect(script.hasTriggers).toBe(true);
  });

  test("should reject documents of the wrong shape", () => {
    expect(() =>
      parseDialogScript({ name: "broken", entry: "Ask", steps: [{ id: "Ask" }] })
    ).toThrow(/Dialog script 'broken' is invalid: steps\.0\.prompt/);
  });
});
