/**
 * PromptAssembler Tests
 *
 * Section order, history window and budget enforcement
 */
import { describe, expect, test } from "vitest";
import {
  PromptAssembler,
  PromptTooLargeError,
  estimateTokens,
  type ContextChunk,
  type Turn,
} from "../src/index";

const PERSONA = "You are a guide.";
const STEP = "Ask what time they would like to come.";

function chunk(id: string, text: string): ContextChunk {
  return { id, sourceId: "test", text, embedding: [1], metadata: {} };
}

function turn(speaker: Turn["speaker"], text: string): Turn {
  return { speaker, text, timestamp: 0 };
}

const CHUNKS = [chunk("c1", "Casa Mar, fish by the sea"), chunk("c2", "Pizza Roma, wood oven")];
const HISTORY = [
  turn("user", "Hi"),
  turn("assistant", "Hello, how many people?"),
  turn("user", "Two of us"),
];

describe("PromptAssembler.assemble", () => {
  test("should lay out persona, step, context and history in order", () => {
    const assembler = new PromptAssembler({ maxPromptTokens: 1000, historyWindow: 10 });

    const prompt = assembler.assemble({
      persona: `  ${PERSONA}\n`,
      step: STEP,
      chunks: [{ chunk: CHUNKS[0], score: 0.9 }, { chunk: CHUNKS[1], score: 0.4 }],
      history: HISTORY,
    });

    const expected = [
      PERSONA,
      STEP,
      "Context:\n### [1]\nCasa Mar, fish by the sea\n###\n### [2]\nPizza Roma, wood oven\n###",
      "Conversation:\nuser: Hi\nassistant: Hello, how many people?\nuser: Two of us",
    ].join("\n\n");
    expect(prompt).toEqual({
      text: expected,
      estimatedTokens: estimateTokens(expected),
      includedChunkIds: ["c1", "c2"],
      droppedChunks: [],
      droppedTurns: 0,
    });
  });

  test("should omit empty sections", () => {
    const assembler = new PromptAssembler({ maxPromptTokens: 1000, historyWindow: 10 });

    const prompt = assembler.assemble({ persona: PERSONA, step: STEP, chunks: [], history: [] });

    expect(prompt.text).toBe(`${PERSONA}\n\n${STEP}`);
  });

  test("should only consider the most recent turns", () => {
    const assembler = new PromptAssembler({ maxPromptTokens: 1000, historyWindow: 2 });

    const prompt = assembler.assemble({ persona: PERSONA, step: STEP, chunks: [], history: HISTORY });

    expect(prompt.text.endsWith(
      "Conversation:\nassistant: Hello, how many people?\nuser: Two of us"
    )).toBe(true);
    expect(prompt.droppedTurns).toBe(0);
  });

  test("should drop the oldest turns before any context", () => {
    const kept = [
      PERSONA,
      STEP,
      "Context:\n### [1]\nCasa Mar, fish by the sea\n###\n### [2]\nPizza Roma, wood oven\n###",
      "Conversation:\nuser: Two of us",
    ].join("\n\n");
    const assembler = new PromptAssembler({
      maxPromptTokens: estimateTokens(kept),
      historyWindow: 10,
    });

    const prompt = assembler.assemble({ persona: PERSONA, step: STEP, chunks: CHUNKS, history: HISTORY });

    expect(prompt.text).toBe(kept);
    expect(prompt.droppedTurns).toBe(2);
    expect(prompt.droppedChunks).toEqual([]);
  });

  test("should drop the lowest-ranked chunk and keep the step verbatim", () => {
    const kept = [PERSONA, STEP, "Context:\n### [1]\nCasa Mar, fish by the sea\n###"].join(
      "\n\n"
    );
    const assembler = new PromptAssembler({
      maxPromptTokens: estimateTokens(kept),
      historyWindow: 10,
    });

    const prompt = assembler.assemble({ persona: PERSONA, step: STEP, chunks: CHUNKS, history: HISTORY });

    expect(prompt.text).toBe(kept);
    expect(prompt.text).toContain(STEP);
    expect(prompt.droppedTurns).toBe(3);
    expect(prompt.droppedChunks).toEqual(["c2"]);
    expect(prompt.includedChunkIds).toEqual(["c1"]);
    expect(prompt.estimatedTokens).toBeLessThanOrEqual(estimateTokens(kept));
  });

  test("should throw when persona and step alone exceed the budget", () => {
    const required = estimateTokens(`${PERSONA}\n\n${STEP}`);
    const assembler = new PromptAssembler({ maxPromptTokens: required - 1, historyWindow: 10 });

    expect(() =>
      assembler.assemble({ persona: PERSONA, step: STEP, chunks: CHUNKS, history: HISTORY })
    ).toThrow(PromptTooLargeError);
  });

  test("should fit exactly at the persona and step size", () => {
    const required = estimateTokens(`${PERSONA}\n\n${STEP}`);
    const assembler = new PromptAssembler({ maxPromptTokens: required, historyWindow: 10 });

    const prompt = assembler.assemble({ persona: PERSONA, step: STEP, chunks: CHUNKS, history: HISTORY });

    expect(prompt.text).toBe(`${PERSONA}\n\n${STEP}`);
    expect(prompt.droppedChunks).toEqual(["c2", "c1"]);
    expect(prompt.droppedTurns).toBe(3);
  });
});

describe("estimateTokens", () => {
  test("should count four characters per token", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("a")).toBe(1);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });
});
