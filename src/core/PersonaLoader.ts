/**
 * Persona prompts, one Markdown file per language
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { DEFAULT_PERSONA } from "../constants";
import { getErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { renderTemplate } from "../utils/template";

export interface LoadPersonasOptions {
  fallbackLanguage?: string;
}

export class PersonaSet {
  constructor(
    private readonly templates: ReadonlyMap<string, string>,
    private readonly fallbackLanguage = "en"
  ) {}

  /**
   * Persona for a language with {{lang}} filled in. Unknown languages use
   * the fallback language's persona.
   */
  get(language: string): string {
    const template =
      this.templates.get(language) ??
      this.templates.get(this.fallbackLanguage) ??
      DEFAULT_PERSONA;
    return renderTemplate(template, { lang: language });
  }

  get languages(): string[] {
    return [...this.templates.keys()];
  }
}

/**
 * Read `<dir>/<lang>.md` for every language. Missing or unreadable files are
 * logged and left out.
 */
export async function loadPersonas(
  dir: string,
  languages: readonly string[],
  options: LoadPersonasOptions = {}
): Promise<PersonaSet> {
  const templates = new Map<string, string>();

  await Promise.all(
    languages.map(async (language) => {
      const path = join(dir, `${language}.md`);
      try {
        templates.set(language, await readFile(path, "utf8"));
      } catch (error) {
        logger.warn(
          `[PersonaLoader] No persona for "${language}" at ${path}: ${getErrorMessage(error)}`
        );
      }
    })
  );

  logger.info(`[PersonaLoader] Loaded ${templates.size} persona(s) from ${dir}`);
  return new PersonaSet(templates, options.fallbackLanguage ?? "en");
}
