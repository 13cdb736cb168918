/**
 * PromptAssembler - builds the completion prompt from ordered sections under
 * a token budget
 */

import type { ContextChunk, ScoredChunk } from "../types/retrieval";
import type { Turn } from "../types/session";
import { PromptTooLargeError } from "../utils/errors";
import { logger } from "../utils/logger";
import { windowHistory } from "../utils/session";
import { estimateTokens } from "../utils/tokens";

/**
 * Prompt sections, in output order
 */
export enum PromptSection {
  PERSONA = "persona",
  STEP = "step",
  CONTEXT = "context",
  HISTORY = "history",
}

export interface PromptAssemblerOptions {
  /** Budget for the whole prompt */
  maxPromptTokens: number;
  /** Most recent turns considered */
  historyWindow: number;
}

export interface AssembleInput {
  persona: string;
  /** Step prompt, already rendered; included verbatim */
  step: string;
  /** Best first */
  chunks: ReadonlyArray<ContextChunk | ScoredChunk>;
  history: readonly Turn[];
}

export interface AssembledPrompt {
  text: string;
  estimatedTokens: number;
  includedChunkIds: string[];
  droppedChunks: string[];
  droppedTurns: number;
}

export class PromptAssembler {
  constructor(private readonly options: PromptAssemblerOptions) {}

  /**
   * Drops the oldest turns first, then the lowest-ranked chunks, until the
   * prompt fits. Persona and step are always kept.
   */
  assemble(input: AssembleInput): AssembledPrompt {
    const budget = this.options.maxPromptTokens;
    const chunks = input.chunks.map((entry) =>
      "chunk" in entry ? entry.chunk : entry
    );
    let turns = windowHistory(input.history, this.options.historyWindow);
    const droppedChunks: string[] = [];
    let droppedTurns = 0;

    const required = estimateTokens(this.render(input, [], []));
    if (required > budget) {
      throw new PromptTooLargeError(required, budget);
    }

    let text = this.render(input, chunks, turns);
    while (estimateTokens(text) > budget) {
      if (turns.length > 0) {
        turns = turns.slice(1);
        droppedTurns++;
      } else {
        const dropped = chunks.pop();
        if (!dropped) {
          break;
        }
        droppedChunks.push(dropped.id);
      }
      text = this.render(input, chunks, turns);
    }

    if (droppedTurns > 0 || droppedChunks.length > 0) {
      logger.debug(
        `[PromptAssembler] Over budget: dropped ${droppedTurns} turn(s) and ${droppedChunks.length} chunk(s)`
      );
    }

    return {
      text,
      estimatedTokens: estimateTokens(text),
      includedChunkIds: chunks.map((chunk) => chunk.id),
      droppedChunks,
      droppedTurns,
    };
  }

  private render(
    input: AssembleInput,
    chunks: readonly ContextChunk[],
    turns: readonly Turn[]
  ): string {
    const sections = new Map<PromptSection, string>([
      [PromptSection.PERSONA, input.persona.trim()],
      [PromptSection.STEP, input.step],
      [PromptSection.CONTEXT, formatContext(chunks)],
      [PromptSection.HISTORY, formatHistory(turns)],
    ]);

    return [...sections.values()]
      .filter((section) => section.length > 0)
      .join("\n\n");
  }
}

function formatContext(chunks: readonly ContextChunk[]): string {
  if (chunks.length === 0) {
    return "";
  }
  const entries = chunks.map(
    (chunk, i) => `### [${i + 1}]\n${chunk.text}\n###`
  );
  return ["Context:", ...entries].join("\n");
}

function formatHistory(turns: readonly Turn[]): string {
  if (turns.length === 0) {
    return "";
  }
  const lines = turns.map((turn) => `${turn.speaker}: ${turn.text}`);
  return ["Conversation:", ...lines].join("\n");
}
