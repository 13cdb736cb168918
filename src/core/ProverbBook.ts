/**
 * ProverbBook - Catalan proverbs ("refranys") picked by the mood of a turn
 */

import { z } from "zod";
import proverbData from "../data/proverbs.json";
import type { Proverb, ProverbSource, SentimentCategory } from "../types/proverb";
import { ValidationError } from "../utils/errors";

const ProverbSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  translation: z.string().min(1),
  sentiment: z.enum(["positive", "negative", "neutral"]),
});

export const DEFAULT_PROVERB: Proverb = {
  id: "default",
  text: "Fes bé i no facis mal, que altre sermó no et cal.",
  translation: "Do good and do no harm, for you need no other sermon.",
  sentiment: "neutral",
};

export interface ProverbBookOptions {
  /** Picks remembered to avoid repeats, default 50 */
  recentWindow?: number;
  /** Uniform in [0, 1) */
  random?: () => number;
}

export function sentimentCategory(score: number): SentimentCategory {
  if (score > 0) {
    return "positive";
  }
  if (score < 0) {
    return "negative";
  }
  return "neutral";
}

export class ProverbBook implements ProverbSource {
  readonly name = "proverb-book";
  private readonly entries: Proverb[];
  private readonly recentWindow: number;
  private readonly random: () => number;
  private recent: string[] = [];

  constructor(entries: readonly Proverb[], options: ProverbBookOptions = {}) {
    this.entries = [...entries];
    this.recentWindow = Math.max(0, options.recentWindow ?? 50);
    this.random = options.random ?? Math.random;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Random proverb of the category, skipping recent picks. Falls back to
   * the whole book when the category is empty, and to the recent ones once
   * all of them were used.
   */
  pick(category: SentimentCategory): Proverb {
    if (this.entries.length === 0) {
      return DEFAULT_PROVERB;
    }

    const matching = this.entries.filter((proverb) => proverb.sentiment === category);
    const pool = matching.length > 0 ? matching : this.entries;
    const fresh = pool.filter(
      (proverb) => !this.recent.includes(recentKey(proverb.id, category))
    );
    const candidates = fresh.length > 0 ? fresh : pool;

    const index = Math.min(
      candidates.length - 1,
      Math.floor(this.random() * candidates.length)
    );
    const proverb = candidates[index] ?? DEFAULT_PROVERB;
    this.remember(recentKey(proverb.id, category));
    return proverb;
  }

  private remember(key: string): void {
    if (this.recentWindow === 0) {
      return;
    }
    this.recent.push(key);
    if (this.recent.length > this.recentWindow) {
      this.recent.shift();
    }
  }
}

/**
 * Validate a proverb list, e.g. read from JSON
 */
export function parseProverbs(input: unknown): Proverb[] {
  const parsed = z.array(ProverbSchema).safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid proverb list", {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      ),
    });
  }
  return parsed.data;
}

/**
 * The bundled Catalan proverbs
 */
export function loadCatalanProverbs(options: ProverbBookOptions = {}): ProverbBook {
  return new ProverbBook(parseProverbs(proverbData), options);
}

function recentKey(id: string, category: SentimentCategory): string {
  return `${id}:${category}`;
}
