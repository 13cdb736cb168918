/**
 * JSON parsing utilities
 */

/**
 * Clean and parse JSON response that might be wrapped in markdown code blocks
 * Handles cases like:
 * - ```json\n{...}\n```
 * - ```\n{...}\n```
 * - Plain JSON with text around it: Sure! {...}
 */
export function parseJSONResponse(text: string): unknown {
  if (!text.trim()) {
    throw new Error("Invalid JSON response: empty input");
  }

  let cleaned = text.trim();

  const codeBlock = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/.exec(cleaned);
  if (codeBlock) {
    cleaned = codeBlock[1].trim();
  } else {
    const start = cleaned.indexOf("{");
    const end = cleaned.lastIndexOf("}");
    if (start >= 0 && end > start) {
      cleaned = cleaned.slice(start, end + 1);
    }
  }

  try {
    return JSON.parse(cleaned);
  } catch (error) {
    throw new Error(
      `Failed to parse JSON response: ${error instanceof Error ? error.message : String(error)}\nContent: ${cleaned.substring(0, 200)}...`
    );
  }
}
