/**
 * SessionStore and SessionLock Tests
 */
import { describe, expect, test } from "vitest";
import {
  SessionBusyError,
  SessionLock,
  SessionNotFoundError,
  SessionStore,
  TurnAbortedError,
  type SessionStoreOptions,
} from "../src/index";

function createStore(overrides: Partial<SessionStoreOptions> = {}) {
  const clock = { now: 1000 };
  const store = new SessionStore({
    entryStep: "Greeting",
    ttlMs: 500,
    lockTimeoutMs: 1000,
    now: () => clock.now,
    ...overrides,
  });
  return { store, clock };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

describe("SessionStore.getOrCreate", () => {
  test("should create a session on the entry step", () => {
    const { store } = createStore({ defaultLanguage: "es", initialMode: "awaiting_trigger" });

    const session = store.getOrCreate("c1");

    expect(session).toEqual({
      conversationId: "c1",
      currentStep: "Greeting",
      slots: {},
      history: [],
      language: "es",
      mode: "awaiting_trigger",
      sentimentTrail: [],
      turnCount: 0,
      createdAt: 1000,
      lastActive: 1000,
    });
  });

  test("should return the existing session for a known id", () => {
    const { store, clock } = createStore();
    store.getOrCreate("c1");
    clock.now = 2000;

    expect(store.getOrCreate("c1").createdAt).toBe(1000);
    expect(store.size).toBe(1);
  });

  test("should generate ids when none is given", () => {
    const { store } = createStore();

    const a = store.getOrCreate();
    const b = store.getOrCreate();

    expect(a.conversationId).not.toBe(b.conversationId);
    expect(store.size).toBe(2);
  });

  test("should reject unknown ids without implicit creation", () => {
    const { store } = createStore({ implicitCreate: false });

    expect(() => store.getOrCreate("missing")).toThrow(SessionNotFoundError);
  });

  test("should hand out copies", () => {
    const { store } = createStore();
    const snapshot = store.getOrCreate("c1");

    snapshot.slots.party_size = 4;
    snapshot.history.push({ speaker: "user", text: "hi", timestamp: 1 });

    expect(store.get("c1")?.slots).toEqual({});
    expect(store.get("c1")?.history).toEqual([]);
  });
});

describe("SessionStore.withLock", () => {
  test("should commit the draft when the callback resolves", async () => {
    const { store } = createStore();
    store.getOrCreate("c1");

    const result = await store.withLock("c1", (draft) => {
      draft.currentStep = "CollectTime";
      draft.slots.party_size = 2;
      return "done";
    });

    expect(result).toBe("done");
    expect(store.get("c1")?.currentStep).toBe("CollectTime");
    expect(store.get("c1")?.slots).toEqual({ party_size: 2 });
  });

  test("should discard the draft when the callback throws", async () => {
    const { store } = createStore();
    store.getOrCreate("c1");

    await expect(
      store.withLock("c1", (draft) => {
        draft.currentStep = "Confirm";
        draft.history.push({ speaker: "user", text: "hi", timestamp: 1 });
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(store.get("c1")?.currentStep).toBe("Greeting");
    expect(store.get("c1")?.history).toEqual([]);
    expect(store.isLocked("c1")).toBe(false);
  });

  test("should reject for sessions that do not exist", async () => {
    const { store } = createStore();

    await expect(store.withLock("missing", () => undefined)).rejects.toBeInstanceOf(
      SessionNotFoundError
    );
    expect(store.isLocked("missing")).toBe(false);
  });

  test("should serialize callbacks for the same conversation", async () => {
    const { store } = createStore();
    store.getOrCreate("c1");
    const gate = deferred();
    const order: string[] = [];

    const first = store.withLock("c1", async (draft) => {
      order.push("first:start");
      await gate.promise;
      draft.turnCount++;
      order.push("first:end");
    });
    const second = store.withLock("c1", (draft) => {
      order.push(`second:${draft.turnCount}`);
      draft.turnCount++;
    });

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second:1"]);
    expect(store.get("c1")?.turnCount).toBe(2);
  });
});

describe("SessionStore.sweep", () => {
  test("should remove sessions idle for longer than the TTL", () => {
    const { store, clock } = createStore();
    store.getOrCreate("old");
    clock.now = 1400;
    store.getOrCreate("recent");

    expect(store.sweep(1501)).toEqual(["old"]);
    expect(store.has("old")).toBe(false);
    expect(store.has("recent")).toBe(true);
  });

  test("should keep sessions exactly at the TTL", () => {
    const { store } = createStore();
    store.getOrCreate("c1");

    expect(store.sweep(1500)).toEqual([]);
  });

  test("should skip sessions whose lock is held", async () => {
    const { store } = createStore();
    store.getOrCreate("c1");
    const gate = deferred();

    const turn = store.withLock("c1", () => gate.promise);
    expect(store.sweep(10_000)).toEqual([]);

    gate.resolve();
    await turn;
    expect(store.sweep(10_000)).toEqual(["c1"]);
  });

  test("should not delete a locked session", async () => {
    const { store } = createStore();
    store.getOrCreate("c1");
    const gate = deferred();

    const turn = store.withLock("c1", () => gate.promise);
    expect(store.delete("c1")).toBe(false);

    gate.resolve();
    await turn;
    expect(store.delete("c1")).toBe(true);
  });
});

describe("SessionLock", () => {
  test("should grant waiters in arrival order", async () => {
    const lock = new SessionLock();
    const order: number[] = [];

    const releaseFirst = await lock.acquire("c1", 1000);
    const waiting = [1, 2, 3].map((n) =>
      lock.acquire("c1", 1000).then((release) => {
        order.push(n);
        release();
      })
    );
    expect(lock.queueLength("c1")).toBe(3);

    releaseFirst();
    await Promise.all(waiting);

    expect(order).toEqual([1, 2, 3]);
    expect(lock.isLocked("c1")).toBe(false);
  });

  test("should reject with SessionBusyError after the timeout", async () => {
    const lock = new SessionLock();
    const release = await lock.acquire("c1", 1000);

    const error = await lock.acquire("c1", 20).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SessionBusyError);
    expect(lock.queueLength("c1")).toBe(0);
    release();
    expect(lock.isLocked("c1")).toBe(false);
  });

  test("should reject with TurnAbortedError when the signal aborts", async () => {
    const lock = new SessionLock();
    const release = await lock.acquire("c1", 1000);
    const controller = new AbortController();

    const pending = lock.acquire("c1", 1000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(TurnAbortedError);
    expect(lock.queueLength("c1")).toBe(0);
    release();
  });

  test("should ignore a second release", async () => {
    const lock = new SessionLock();
    const release = await lock.acquire("c1", 1000);
    const next = lock.acquire("c1", 1000);

    release();
    release();
    const releaseNext = await next;

    expect(lock.isLocked("c1")).toBe(true);
    releaseNext();
    expect(lock.isLocked("c1")).toBe(false);
  });

  test("should not block other conversations", async () => {
    const lock = new SessionLock();
    await lock.acquire("a", 1000);

    const release = await lock.acquire("b", 10);

    expect(lock.activeConversationIds).toEqual(["a", "b"]);
    release();
  });
});
