/**
 * Rule-based slot and intent extraction driven by a word lexicon
 */

import lexicon from "../data/slot-lexicon.json";
import type {
  SlotExtraction,
  SlotExtractionRequest,
  SlotExtractor,
  SlotValue,
} from "../types/dialog";
import { containsPhrase, normalizeWords } from "../utils/text";

export interface SlotLexicon {
  /** Number words per language */
  numbers: Record<string, Record<string, number>>;
  affirm: Record<string, string[]>;
  deny: Record<string, string[]>;
  /** Words that turn a bare hour into a time, e.g. "19 h", "7 Uhr" */
  hourSuffixes: string[];
}

const DEFAULT_LEXICON: SlotLexicon = lexicon;

/** Largest party accepted as a count */
const MAX_COUNT = 50;

interface TimeMatch {
  value: string;
  index: number;
  length: number;
}

export class PatternSlotExtractor implements SlotExtractor {
  readonly name = "pattern";
  private readonly hourSuffixPattern: RegExp;

  constructor(private readonly lexicon: SlotLexicon = DEFAULT_LEXICON) {
    const suffixes = lexicon.hourSuffixes.map(escapeRegExp).join("|");
    this.hourSuffixPattern = new RegExp(
      `(?<![\\p{L}\\p{N}])([01]?\\d|2[0-3])\\s*(?:${suffixes})(?![\\p{L}])`,
      "iu"
    );
  }

  async extract(
    input: string,
    request: SlotExtractionRequest
  ): Promise<SlotExtraction> {
    const slots: Record<string, SlotValue> = {};
    const time = this.findTime(input);
    // Digits of a time must not be read as a count
    const rest = time
      ? input.slice(0, time.index) + " " + input.slice(time.index + time.length)
      : input;
    const intent = this.findIntent(input, request.language);

    for (const [name, definition] of Object.entries(request.slots)) {
      switch (definition.kind) {
        case "time":
          if (time) {
            slots[name] = time.value;
          }
          break;
        case "count": {
          const count = this.findCount(rest, request.language);
          if (count !== undefined) {
            slots[name] = count;
          }
          break;
        }
        case "boolean":
          if (intent === "affirm" || intent === "deny") {
            slots[name] = intent === "affirm";
          }
          break;
        case "text": {
          const text = input.trim();
          if (text.length > 0) {
            slots[name] = text;
          }
          break;
        }
      }
    }

    return intent ? { slots, intent } : { slots };
  }

  /**
   * First time expression as HH:MM: "7pm", "7:30 p.m.", "19:30", "19.30",
   * "19h30", "7 h"
   */
  findTime(input: string): TimeMatch | undefined {
    const meridiem =
      /(?<![\p{N}])(1[0-2]|0?[1-9])(?::([0-5]\d))?\s*([ap])\.?m\.?(?![\p{L}])/iu.exec(
        input
      );
    if (meridiem) {
      const hour = Number(meridiem[1]) % 12;
      const minutes = meridiem[2] === undefined ? 0 : Number(meridiem[2]);
      const isPm = meridiem[3].toLowerCase() === "p";
      return {
        value: formatTime(isPm ? hour + 12 : hour, minutes),
        index: meridiem.index,
        length: meridiem[0].length,
      };
    }

    const clock = /(?<![\p{N}])([01]?\d|2[0-3])[:.h]([0-5]\d)(?![\p{N}])/iu.exec(
      input
    );
    if (clock) {
      return {
        value: formatTime(Number(clock[1]), Number(clock[2])),
        index: clock.index,
        length: clock[0].length,
      };
    }

    const hour = this.hourSuffixPattern.exec(input);
    if (hour) {
      return {
        value: formatTime(Number(hour[1]), 0),
        index: hour.index,
        length: hour[0].length,
      };
    }

    return undefined;
  }

  /**
   * First number in 1..MAX_COUNT, written in digits or as a word
   */
  findCount(input: string, language: string): number | undefined {
    const words = normalizeWords(input);
    const numberWords = this.numberWords(language);

    for (const word of words) {
      if (/^\d{1,3}$/.test(word)) {
        const value = Number(word);
        if (value >= 1 && value <= MAX_COUNT) {
          return value;
        }
        continue;
      }
      const value = numberWords.get(word);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  /**
   * "affirm" or "deny" when exactly one of them is present
   */
  findIntent(input: string, language: string): string | undefined {
    const words = normalizeWords(input);
    const affirmed = this.phrases(this.lexicon.affirm, language).some((phrase) =>
      containsPhrase(words, phrase)
    );
    const denied = this.phrases(this.lexicon.deny, language).some((phrase) =>
      containsPhrase(words, phrase)
    );

    if (affirmed === denied) {
      return undefined;
    }
    return affirmed ? "affirm" : "deny";
  }

  private numberWords(language: string): Map<string, number> {
    const entries = {
      ...this.lexicon.numbers.en,
      ...this.lexicon.numbers[language],
    };
    return new Map(
      Object.entries(entries).map(([word, value]) => [
        normalizeWords(word).join(" "),
        value,
      ])
    );
  }

  /**
   * Normalized phrases for the language, plus English
   */
  private phrases(
    table: Record<string, string[]>,
    language: string
  ): string[][] {
    const words = new Set([...(table[language] ?? []), ...(table.en ?? [])]);
    return [...words].map((phrase) => normalizeWords(phrase));
  }
}

function formatTime(hours: number, minutes: number): string {
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
