import type { LocalizedText } from "../types";

/**
 * Renders template variables in a string using the provided values.
 * Supports {{variable}} and {{object.property}} syntax for property access.
 * Placeholders without a value are kept as written.
 *
 * @example
 * ```typescript
 * renderTemplate("A table for {{party_size}} at {{time}}", { party_size: 2 });
 * // Result: "A table for 2 at {{time}}"
 * ```
 */
export function renderTemplate(
  template: string,
  values: Record<string, unknown> | undefined
): string {
  if (!template || !values) {
    return template;
  }

  return template.replace(
    /\{\{([^}]+)\}\}/g,
    (match: string, path: string): string => {
      const value = getValueByPath(values, path.trim());
      if (value === undefined || value === null) {
        return match;
      }
      return valueToString(value);
    }
  );
}

/**
 * Names of the placeholders a template refers to, in order of appearance
 */
export function templateVariables(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(/\{\{([^}]+)\}\}/g)) {
    const name = match[1].trim();
    if (!names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Pick the variant of a localized text for a language, falling back to the
 * fallback language and then to the first variant declared.
 */
export function localize(
  text: LocalizedText,
  language: string,
  fallbackLanguage = "en"
): string {
  if (typeof text === "string") {
    return text;
  }
  return (
    text[language] ?? text[fallbackLanguage] ?? Object.values(text)[0] ?? ""
  );
}

/**
 * Gets a value from an object using dot notation path.
 */
function getValueByPath(obj: Record<string, unknown>, path: string): unknown {
  const keys = path.split(".");
  let current: unknown = obj;

  for (const key of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Converts a value to its string representation for template rendering.
 */
function valueToString(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => valueToString(item)).join(", ");
  }

  try {
    return JSON.stringify(value);
  } catch {
    return "[object Object]";
  }
}
