import type { SessionState, Turn } from "../types/session";

/**
 * Clones a session to prevent mutation outside the store
 */
export function cloneSession(session: SessionState): SessionState {
  return structuredClone(session);
}

/**
 * The most recent `size` turns, oldest first
 */
export function windowHistory(history: readonly Turn[], size: number): Turn[] {
  if (size <= 0) {
    return [];
  }
  return history.slice(-size);
}
