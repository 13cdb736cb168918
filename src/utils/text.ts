/**
 * Lowercased words of a text with diacritics removed
 */
export function normalizeWords(text: string): string[] {
  return text
    .toLowerCase()
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length > 0);
}

/**
 * Whether `phrase` occurs in `words` as a contiguous run
 */
export function containsPhrase(
  words: readonly string[],
  phrase: readonly string[]
): boolean {
  if (phrase.length === 0 || phrase.length > words.length) {
    return false;
  }
  for (let start = 0; start + phrase.length <= words.length; start++) {
    if (phrase.every((word, offset) => words[start + offset] === word)) {
      return true;
    }
  }
  return false;
}

/**
 * Remove control characters (keeping tabs and newlines) and cut the text to
 * `maxLength` code points
 */
export function sanitizeMessage(text: string, maxLength: number): string {
  const cleaned = text
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f-\u009f]/g, "")
    .trim();
  const codePoints = Array.from(cleaned);
  return codePoints.length > maxLength
    ? codePoints.slice(0, maxLength).join("").trimEnd()
    : cleaned;
}
