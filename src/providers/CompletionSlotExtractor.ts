/**
 * Slot and intent extraction delegated to a completion model
 */

import { z } from "zod";
import type { CompletionProvider } from "../types/ai";
import type {
  SlotDefinition,
  SlotExtraction,
  SlotExtractionRequest,
  SlotExtractor,
  SlotValue,
} from "../types/dialog";
import { ValidationError } from "../utils/errors";
import { parseJSONResponse } from "../utils/json";

const ExtractionResponseSchema = z.object({
  slots: z
    .record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()]))
    .default({}),
  intent: z.enum(["affirm", "deny"]).nullable().optional(),
});

const KIND_INSTRUCTIONS: Record<SlotDefinition["kind"], string> = {
  count: "a whole number",
  time: 'a 24-hour time such as "19:30"',
  text: "a short string",
  boolean: "true or false",
};

export interface CompletionSlotExtractorOptions {
  maxOutputTokens?: number;
}

export class CompletionSlotExtractor implements SlotExtractor {
  readonly name: string;

  constructor(
    private readonly provider: CompletionProvider,
    private readonly options: CompletionSlotExtractorOptions = {}
  ) {
    this.name = `completion:${provider.name}`;
  }

  async extract(
    input: string,
    request: SlotExtractionRequest
  ): Promise<SlotExtraction> {
    const output = await this.provider.complete({
      prompt: this.buildPrompt(input, request),
      parameters: {
        maxOutputTokens: this.options.maxOutputTokens ?? 150,
        temperature: 0,
      },
      signal: request.signal,
    });

    const parsed = ExtractionResponseSchema.safeParse(
      parseJSONResponse(output.text)
    );
    if (!parsed.success) {
      throw new ValidationError("Slot extraction response has the wrong shape", {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const slots: Record<string, SlotValue> = {};
    for (const [name, definition] of Object.entries(request.slots)) {
      const value = coerce(parsed.data.slots[name], definition);
      if (value !== undefined) {
        slots[name] = value;
      }
    }

    return parsed.data.intent ? { slots, intent: parsed.data.intent } : { slots };
  }

  buildPrompt(input: string, request: SlotExtractionRequest): string {
    const lines = Object.entries(request.slots).map(
      ([name, definition]) =>
        `- ${name}: ${KIND_INSTRUCTIONS[definition.kind]}${
          definition.description ? ` (${definition.description})` : ""
        }`
    );

    return [
      "Extract booking details from the user's message.",
      lines.length > 0 ? `Fields:\n${lines.join("\n")}` : "Fields: none",
      'Use null for anything the message does not state. Set "intent" to "affirm" when the user agrees, "deny" when they refuse, otherwise null.',
      'Reply with JSON only: {"slots": {...}, "intent": ...}',
      `Message (${request.language}): """${input}"""`,
    ].join("\n\n");
  }
}

function coerce(
  value: string | number | boolean | null | undefined,
  definition: SlotDefinition
): SlotValue | undefined {
  if (value === null || value === undefined || value === "") {
    return undefined;
  }

  switch (definition.kind) {
    case "count": {
      const count = typeof value === "number" ? value : Number(value);
      return Number.isInteger(count) && count > 0 ? count : undefined;
    }
    case "time": {
      const match = /^(\d{1,2}):(\d{2})$/.exec(String(value).trim());
      if (!match || Number(match[1]) > 23 || Number(match[2]) > 59) {
        return undefined;
      }
      return `${match[1].padStart(2, "0")}:${match[2]}`;
    }
    case "boolean":
      if (typeof value === "boolean") {
        return value;
      }
      return value === "true" ? true : value === "false" ? false : undefined;
    case "text":
      return String(value);
  }
}
