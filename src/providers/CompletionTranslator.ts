/**
 * Translation through a completion model
 */

import type { CompletionProvider } from "../types/ai";
import type { Translator } from "../types/language";

const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  en: "English",
  es: "Spanish",
  fr: "French",
  de: "German",
  ca: "Catalan",
  ru: "Russian",
};

export class CompletionTranslator implements Translator {
  readonly name: string;

  constructor(private readonly provider: CompletionProvider) {
    this.name = `completion:${provider.name}`;
  }

  async translate(
    text: string,
    target: string,
    source?: string,
    signal?: AbortSignal
  ): Promise<string> {
    const from = source ? ` from ${languageName(source)}` : "";
    const output = await this.provider.complete({
      prompt: [
        `Translate the text${from} into ${languageName(target)}.`,
        "Keep names, numbers and times unchanged. Reply with the translation only.",
        `Text:\n${text}`,
      ].join("\n\n"),
      parameters: { temperature: 0 },
      signal,
    });
    return output.text.trim();
  }
}

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}
