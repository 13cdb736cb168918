/**
 * Per-conversation mutual exclusion with FIFO hand-off and bounded waits
 */

import { SessionBusyError, TurnAbortedError } from "../utils/errors";

interface Waiter {
  grant: () => void;
  reject: (error: Error) => void;
}

interface LockEntry {
  waiters: Waiter[];
}

export type ReleaseLock = () => void;

export class SessionLock {
  private locks = new Map<string, LockEntry>();

  /**
   * Acquire the lock for a conversation. Resolves with a release function once
   * every earlier acquirer has released. Rejects with SessionBusyError after
   * `timeoutMs`, or TurnAbortedError when the signal aborts first.
   */
  acquire(
    conversationId: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<ReleaseLock> {
    if (signal?.aborted) {
      return Promise.reject(new TurnAbortedError());
    }

    const entry = this.locks.get(conversationId);
    if (!entry) {
      this.locks.set(conversationId, { waiters: [] });
      return Promise.resolve(this.createRelease(conversationId));
    }

    const startedAt = Date.now();

    return new Promise<ReleaseLock>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };
      const leaveQueue = () => {
        const index = entry.waiters.indexOf(waiter);
        if (index >= 0) {
          entry.waiters.splice(index, 1);
        }
      };
      const waiter: Waiter = {
        grant: () => {
          cleanup();
          resolve(this.createRelease(conversationId));
        },
        reject: (error: Error) => {
          cleanup();
          leaveQueue();
          reject(error);
        },
      };
      const onAbort = () => waiter.reject(new TurnAbortedError());
      const timer = setTimeout(
        () =>
          waiter.reject(
            new SessionBusyError(conversationId, Date.now() - startedAt)
          ),
        timeoutMs
      );

      signal?.addEventListener("abort", onAbort, { once: true });
      entry.waiters.push(waiter);
    });
  }

  /** Check if a conversation is currently locked. */
  isLocked(conversationId: string): boolean {
    return this.locks.has(conversationId);
  }

  /** Number of turns queued behind the current holder */
  queueLength(conversationId: string): number {
    return this.locks.get(conversationId)?.waiters.length ?? 0;
  }

  /** Return all conversation IDs that currently hold the lock. */
  get activeConversationIds(): string[] {
    return [...this.locks.keys()];
  }

  private createRelease(conversationId: string): ReleaseLock {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const entry = this.locks.get(conversationId);
      const next = entry?.waiters.shift();
      if (next) {
        next.grant();
      } else {
        this.locks.delete(conversationId);
      }
    };
  }
}
