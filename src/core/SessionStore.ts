/**
 * SessionStore - keyed in-memory registry of conversation state
 *
 * Every mutation happens inside `withLock`, which serializes turns per
 * conversation and commits the mutated draft only when the turn succeeds.
 */

import type { DialogMode, SessionState } from "../types/session";
import { SessionNotFoundError } from "../utils/errors";
import { cloneSession } from "../utils/session";
import { createConversationId } from "../utils/id";
import { logger } from "../utils/logger";
import { SessionLock } from "./SessionLock";

export interface SessionStoreOptions {
  /** Step new sessions start on */
  entryStep: string;
  /** Mode new sessions start in */
  initialMode?: DialogMode;
  defaultLanguage?: string;
  /** Idle time after which a session is swept */
  ttlMs: number;
  /** Maximum wait for a conversation lock */
  lockTimeoutMs: number;
  /** Create sessions for unknown caller-supplied ids */
  implicitCreate?: boolean;
  /** Clock, epoch milliseconds */
  now?: () => number;
}

export interface WithLockOptions {
  signal?: AbortSignal;
}

export class SessionStore {
  private sessions = new Map<string, SessionState>();
  private lock = new SessionLock();
  private sweepTimer?: ReturnType<typeof setInterval>;
  private readonly now: () => number;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Return a snapshot of an existing session, or create one.
   * Without an id a new id is generated.
   */
  getOrCreate(conversationId?: string): SessionState {
    if (conversationId !== undefined) {
      const existing = this.sessions.get(conversationId);
      if (existing) {
        return cloneSession(existing);
      }
      if (!(this.options.implicitCreate ?? true)) {
        throw new SessionNotFoundError(conversationId);
      }
    }

    const session = this.create(conversationId ?? createConversationId());
    return cloneSession(session);
  }

  /**
   * Snapshot of a session, if present
   */
  get(conversationId: string): SessionState | undefined {
    const session = this.sessions.get(conversationId);
    return session ? cloneSession(session) : undefined;
  }

  has(conversationId: string): boolean {
    return this.sessions.has(conversationId);
  }

  get size(): number {
    return this.sessions.size;
  }

  isLocked(conversationId: string): boolean {
    return this.lock.isLocked(conversationId);
  }

  /**
   * Run `fn` on a private draft of the session while holding its lock.
   * The draft replaces the stored state when `fn` resolves and is discarded
   * when it rejects. The lock is released on every path.
   */
  async withLock<T>(
    conversationId: string,
    fn: (draft: SessionState) => Promise<T> | T,
    options: WithLockOptions = {}
  ): Promise<T> {
    const release = await this.lock.acquire(
      conversationId,
      this.options.lockTimeoutMs,
      options.signal
    );

    try {
      const current = this.sessions.get(conversationId);
      if (!current) {
        throw new SessionNotFoundError(conversationId);
      }

      const draft = cloneSession(current);
      const result = await fn(draft);
      this.sessions.set(conversationId, draft);
      return result;
    } finally {
      release();
    }
  }

  /**
   * Remove sessions idle for longer than the TTL. Sessions with a held or
   * queued lock are left alone.
   */
  sweep(now: number = this.now()): string[] {
    const removed: string[] = [];

    for (const [id, session] of this.sessions) {
      if (now - session.lastActive <= this.options.ttlMs) {
        continue;
      }
      if (this.lock.isLocked(id)) {
        logger.debug(`[SessionStore] Skipping locked expired session ${id}`);
        continue;
      }
      this.sessions.delete(id);
      removed.push(id);
    }

    if (removed.length > 0) {
      logger.info(`[SessionStore] Swept ${removed.length} expired session(s)`);
    }
    return removed;
  }

  startSweeper(intervalMs: number): void {
    this.stopSweeper();
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  /**
   * Delete a session outright. Returns false when it was unknown or locked.
   */
  delete(conversationId: string): boolean {
    if (this.lock.isLocked(conversationId)) {
      return false;
    }
    return this.sessions.delete(conversationId);
  }

  private create(conversationId: string): SessionState {
    const now = this.now();
    const session: SessionState = {
      conversationId,
      currentStep: this.options.entryStep,
      slots: {},
      history: [],
      language: this.options.defaultLanguage ?? "en",
      mode: this.options.initialMode ?? "scripted",
      sentimentTrail: [],
      turnCount: 0,
      createdAt: now,
      lastActive: now,
    };

    this.sessions.set(conversationId, session);
    logger.debug(`[SessionStore] Created session ${conversationId}`);
    return session;
  }
}
