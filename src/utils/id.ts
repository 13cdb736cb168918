/**
 * ID generation utilities
 */

/**
 * Generate a deterministic ID from a string by creating a simple hash
 * This ensures the same input always produces the same ID
 */
function simpleHash(str: string): string {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash; // Convert to 32-bit integer
  }
  return Math.abs(hash).toString(36);
}

/**
 * Sanitize a string for use in an ID
 */
function sanitize(str: string): string {
  return str.toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
}

/**
 * Generate a new conversation ID
 * Format: conv_{timestamp}_{random}
 */
export function createConversationId(): string {
  return `conv_${Date.now()}_${Math.random().toString(36).slice(2)}`;
}

/**
 * Generate a deterministic chunk ID for ingested knowledge
 * Format: chunk_{sanitized_source}_{hash}
 */
export function generateChunkId(sourceId: string, text: string): string {
  return `chunk_${sanitize(sourceId)}_${simpleHash(`${sourceId}\n${text}`)}`;
}
