/**
 * Unit tests for the session store: lazy priming, per-session ordering, reset.
 */

import { SessionStore } from "../../../src/memory/session-store";
import { PromptManager } from "../../../src/prompts/prompt-manager";

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

function makeStore(): SessionStore {
  const promptManager = new PromptManager({
    claude: { primingPair: { user: "C-U", assistant: "C-A" } },
    openai: { primingPair: { user: "O-U", assistant: "O-A" } },
  });
  return new SessionStore({ maxMessages: 5, promptManager });
}

describe("SessionStore", () => {
  it("creates and primes one buffer per provider on first use", () => {
    const store = makeStore();
    const claude = store.getBuffer("s1", "claude");
    const openai = store.getBuffer("s1", "openai");
    expect(claude).not.toBe(openai);
    expect(store.getBuffer("s1", "claude")).toBe(claude);
    expect(claude.snapshot().messages.map((m) => m.content)).toEqual(["C-U", "C-A"]);
    expect(openai.snapshot().messages.map((m) => m.content)).toEqual(["O-U", "O-A"]);
    expect(claude.capacity).toBe(5);
  });

  it("reports an unknown session as empty history", () => {
    const store = makeStore();
    expect(store.getHistory("nobody", "claude")).toEqual({
      sessionId: "nobody",
      messages: [],
      examplesInjected: false,
      hasCode: false,
    });
    expect(store.has("nobody")).toBe(false);
  });

  it("shares the last generated code across providers", () => {
    const store = makeStore();
    store.setLastGeneratedCode("s1", "{}");
    expect(store.getLastGeneratedCode("s1")).toBe("{}");
    expect(store.getHistory("s1", "openai").hasCode).toBe(true);
    expect(store.getLastGeneratedCode("s2")).toBeUndefined();
  });

  it("reset drops everything and is idempotent", async () => {
    const store = makeStore();
    store.getBuffer("s1", "claude").addMessage("user", "hello");
    store.setLastGeneratedCode("s1", "{}");
    await store.reset("s1");
    await store.reset("s1");
    await store.reset("never-seen");
    expect(store.has("s1")).toBe(false);
    expect(store.getLastGeneratedCode("s1")).toBeUndefined();
    expect(store.getHistory("s1", "claude").messages).toEqual([]);
  });

  it("counts sessions and buffers per provider", () => {
    const store = makeStore();
    store.getBuffer("a", "claude");
    store.getBuffer("b", "claude");
    store.getBuffer("b", "openai");
    store.setLastGeneratedCode("c", "{}");
    expect(store.stats()).toEqual({ sessions: 3, byProvider: { claude: 2, openai: 1 } });
  });

  describe("runExclusive", () => {
    it("runs tasks for one session strictly in order", async () => {
      const store = makeStore();
      const events: string[] = [];
      let releaseFirst = (): void => undefined;
      const gate = new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });

      const first = store.runExclusive("s1", async () => {
        events.push("first:start");
        await gate;
        events.push("first:end");
        return 1;
      });
      const second = store.runExclusive("s1", async () => {
        events.push("second:start");
        return 2;
      });

      await flush();
      expect(events).toEqual(["first:start"]);
      releaseFirst();
      expect(await first).toBe(1);
      expect(await second).toBe(2);
      expect(events).toEqual(["first:start", "first:end", "second:start"]);
    });

    it("lets different sessions run concurrently", async () => {
      const store = makeStore();
      const started: string[] = [];
      let release = (): void => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const a = store.runExclusive("a", async () => {
        started.push("a");
        await gate;
      });
      const b = store.runExclusive("b", async () => {
        started.push("b");
        await gate;
      });

      await flush();
      expect(started).toEqual(["a", "b"]);
      release();
      await Promise.all([a, b]);
    });

    it("passes a rejection to its caller and keeps the queue moving", async () => {
      const store = makeStore();
      const failing = store.runExclusive("s1", async () => {
        throw new Error("boom");
      });
      const next = store.runExclusive("s1", async () => "ok");
      await expect(failing).rejects.toThrow("boom");
      await expect(next).resolves.toBe("ok");
    });

    it("reset waits for an in-flight turn on the same session", async () => {
      const store = makeStore();
      let release = (): void => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const turn = store.runExclusive("s1", async () => {
        await gate;
        store.setLastGeneratedCode("s1", "late");
      });
      const reset = store.reset("s1");

      await flush();
      expect(store.has("s1")).toBe(false);
      release();
      await turn;
      await reset;
      expect(store.getLastGeneratedCode("s1")).toBeUndefined();
    });
  });
});
