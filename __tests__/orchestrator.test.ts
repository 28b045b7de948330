import { describe, it, expect, vi, beforeEach } from "vitest";
import { APICallError } from "ai";
import { Arena, createArena, createArenaFromEnv } from "@/lib/arena/orchestrator";
import type { GenerateFn, GenerateRequest } from "@/lib/arena/completion";
import { parseArenaConfig, ConfigError } from "@/lib/config";
import type { Model, VoteRecord, VoteStore } from "@/lib/arena/types";

const T0 = 1_700_000_000_000;

const MODELS: Model[] = [
  { id: "M1", name: "Model One", category: "general", contextLength: 8192 },
  { id: "M2", name: "Model Two", category: "general", contextLength: 8192 },
  { id: "M3", name: "Model Three", category: "code", contextLength: 4096 },
];

const CONFIG = parseArenaConfig({
  apiKey: "test-key",
  apiBaseUrl: "https://llm.example.test/v1",
  models: MODELS,
  cooldownWindowMs: 60_000,
  requestTimeoutMs: 50,
  maxRetries: 2,
  retryBaseDelayMs: 0,
});

function promptOf(request: GenerateRequest): string {
  return request.messages[request.messages.length - 1]?.content ?? "";
}

function throttledError() {
  return new APICallError({
    message: "Too Many Requests",
    url: "https://llm.example.test/v1/chat/completions",
    requestBodyValues: {},
    statusCode: 429,
  });
}

/** Random source that always picks the first eligible ids in order. */
const firstTwo = () => 0;

function seeded(seed: number) {
  let state = seed;
  return () => {
    state = (state * 1_664_525 + 1_013_904_223) % 4_294_967_296;
    return state / 4_294_967_296;
  };
}

function setup(options: {
  generate: GenerateFn;
  random?: () => number;
  onVoteStoreFailure?: (failure: unknown, record: VoteRecord) => void;
  insert?: VoteStore["insert"];
}) {
  let now = T0;
  const records: VoteRecord[] = [];
  const insert = vi.fn<VoteStore["insert"]>(
    options.insert ??
      (async (record) => {
        records.push(record);
        return { ok: true };
      })
  );
  const generate = vi.fn<GenerateFn>(options.generate);
  const arena = createArena(CONFIG, {
    store: { insert },
    clock: () => now,
    random: options.random ?? firstTwo,
    generate,
    onVoteStoreFailure: options.onVoteStoreFailure,
  });
  return {
    arena,
    insert,
    records,
    generate,
    setNow: (value: number) => {
      now = value;
    },
  };
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

// ---------------------------------------------------------------------------
// Full rounds
// ---------------------------------------------------------------------------

describe("Arena.playRound", () => {
  it("runs a round from prompt to revealed tie vote", async () => {
    const replies: Record<string, string> = { M1: "Hi there", M2: "Hello!", M3: "Hey" };
    const { arena, insert } = setup({
      generate: async ({ model }) => ({ text: replies[model], totalTokens: 3 }),
    });
    const session = arena.sessions.getOrCreate("token-1");

    const outcome = await arena.playRound(session, "Hello");

    expect(outcome).toMatchObject({ ok: true, sequence: 1 });
    expect(session.state).toBe("awaiting_vote");

    const request = session.current.request;
    expect(request?.modelA).toBe("M1");
    expect(request?.modelB).toBe("M2");

    const view = session.view();
    expect(view.revealed).toBeNull();
    expect(view.sides.map((s) => s.outcome)).toMatchObject([
      { ok: true, text: "Hi there", tokenCount: 3 },
      { ok: true, text: "Hello!", tokenCount: 3 },
    ]);

    const voted = arena.castVote(session, "Tie");
    expect(voted).toMatchObject({
      ok: true,
      record: { vote: "Tie", modelA: "M1", modelB: "M2", sessionId: "token-1", votedAt: T0 },
      revealed: { A: "M1", B: "M2" },
    });
    expect(arena.reveal(session)).toEqual({ A: MODELS[0], B: MODELS[1] });
    expect(insert).toHaveBeenCalledTimes(1);
  });

  it("always pairs two distinct registered models", async () => {
    const { arena } = setup({
      generate: async () => ({ text: "ok", totalTokens: 1 }),
      random: seeded(11),
    });
    const session = arena.sessions.getOrCreate();

    for (let i = 0; i < 30; i++) {
      await arena.playRound(session, `prompt ${i}`);
      const request = session.current.request;
      expect(request).not.toBeNull();
      expect(request?.modelA).not.toBe(request?.modelB);
      expect(["M1", "M2", "M3"]).toContain(request?.modelA);
      expect(["M1", "M2", "M3"]).toContain(request?.modelB);
    }
  });

  it("a timed-out side still lets the round reach the vote", async () => {
    const { arena } = setup({
      generate: ({ model }) =>
        model === "M1"
          ? new Promise<never>(() => {})
          : Promise.resolve({ text: "Hello!", totalTokens: 2 }),
    });

    const session = arena.sessions.getOrCreate();
    await arena.playRound(session, "Hello");

    expect(session.state).toBe("awaiting_vote");
    const result = session.current.result;
    expect(result?.A).toEqual({
      ok: false,
      kind: "timeout",
      message: "Request timed out after 50ms",
      attempts: 1,
    });
    expect(result?.B).toMatchObject({ ok: true, text: "Hello!" });

    expect(arena.castVote(session, "BothBad")).toMatchObject({
      ok: true,
      record: { vote: "BothBad" },
    });
  });

  it("allows voting for the side that answered", async () => {
    const { arena } = setup({
      generate: ({ model }) =>
        model === "M1"
          ? new Promise<never>(() => {})
          : Promise.resolve({ text: "Hello!", totalTokens: 2 }),
    });
    const session = arena.sessions.getOrCreate();
    await arena.playRound(session, "Hello");

    expect(arena.castVote(session, "B")).toMatchObject({ ok: true, record: { vote: "B" } });
  });

  it("rejects an invalid prompt without calling any model", async () => {
    const { arena, generate } = setup({
      generate: async () => ({ text: "ok", totalTokens: 1 }),
    });
    const session = arena.sessions.getOrCreate();

    expect(await arena.playRound(session, "   ")).toEqual({
      ok: false,
      reason: "validation_error",
      message: "Prompt cannot be empty",
    });
    expect(await arena.playRound(session, "x".repeat(2_001))).toMatchObject({
      ok: false,
      reason: "validation_error",
    });
    expect(session.state).toBe("idle");
    expect(generate).not.toHaveBeenCalled();
  });

  it("does not re-run an unchanged prompt", async () => {
    const { arena, generate } = setup({
      generate: async () => ({ text: "ok", totalTokens: 1 }),
    });
    const session = arena.sessions.getOrCreate();
    await arena.playRound(session, "Hello");

    const again = await arena.playRound(session, "Hello");

    expect(again).toMatchObject({ ok: false, reason: "unchanged", view: { sequence: 1 } });
    expect(generate).toHaveBeenCalledTimes(2);
  });

  it("drops the results of a round replaced while in flight", async () => {
    let releaseFirst: () => void = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const { arena } = setup({
      generate: async (request) => {
        const prompt = promptOf(request);
        if (prompt === "first") await firstGate;
        return { text: `${prompt} from ${request.model}`, totalTokens: 1 };
      },
    });
    const session = arena.sessions.getOrCreate();

    const firstRound = arena.playRound(session, "first");
    const second = await arena.playRound(session, "second");
    expect(second).toMatchObject({ ok: true, sequence: 2 });

    releaseFirst();
    expect(await firstRound).toEqual({ ok: false, reason: "stale", sequence: 1 });

    const view = session.view();
    expect(view.sequence).toBe(2);
    expect(view.prompt).toBe("second");
    expect(view.sides.map((s) => s.outcome)).toMatchObject([
      { ok: true, text: "second from M1" },
      { ok: true, text: "second from M2" },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Throttling across rounds
// ---------------------------------------------------------------------------

describe("Arena throttling", () => {
  it("benches a throttled model for the cooldown window", async () => {
    const { arena, setNow } = setup({
      generate: async ({ model }) => {
        if (model === "M1") throw throttledError();
        return { text: `reply from ${model}`, totalTokens: 1 };
      },
      random: seeded(99),
    });

    // First round at T0 (random forced to pick M1 by running until it does)
    const session = arena.sessions.getOrCreate();
    let round = 0;
    while (!arena.tracker.isThrottled("M1", T0)) {
      await arena.playRound(session, `warm-up ${round++}`);
      expect(round).toBeLessThan(50);
    }

    const withM1 = session.current.result;
    const sides = [withM1?.A, withM1?.B];
    expect(sides).toContainEqual({
      ok: false,
      kind: "throttled",
      message: "Too Many Requests",
      attempts: 3,
    });

    setNow(T0 + 30_000);
    for (let i = 0; i < 20; i++) {
      await arena.playRound(session, `during cooldown ${i}`);
      const request = session.current.request;
      expect(request?.modelA).not.toBe("M1");
      expect(request?.modelB).not.toBe("M1");
    }

    setNow(T0 + 61_000);
    expect(arena.selector.eligibleIds(T0 + 61_000)).toContain("M1");
  });

  it("asks the user to retry when fewer than two models are available", async () => {
    const { arena, generate } = setup({
      generate: async () => ({ text: "ok", totalTokens: 1 }),
    });
    arena.tracker.markThrottled("M1", T0);
    arena.tracker.markThrottled("M2", T0);
    const session = arena.sessions.getOrCreate();

    expect(await arena.playRound(session, "Hello")).toEqual({
      ok: false,
      reason: "insufficient_models",
      message: "Not enough models are available right now. Try again in 60s.",
      retryAfterSeconds: 60,
    });
    expect(session.state).toBe("idle");
    expect(generate).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// Votes
// ---------------------------------------------------------------------------

describe("Arena votes", () => {
  it("reveals identities even when persistence fails", async () => {
    const onVoteStoreFailure = vi.fn();
    const { arena } = setup({
      generate: async () => ({ text: "ok", totalTokens: 1 }),
      insert: async () => ({ ok: false, kind: "write_failed", message: "db unavailable" }),
      onVoteStoreFailure,
    });
    const session = arena.sessions.getOrCreate();
    await arena.playRound(session, "Hello");

    const voted = arena.castVote(session, "A");
    await session.current.persistence;

    expect(voted.ok).toBe(true);
    expect(arena.reveal(session)).toEqual({ A: MODELS[0], B: MODELS[1] });
    expect(onVoteStoreFailure).toHaveBeenCalledTimes(1);
  });

  it("a second vote changes nothing", async () => {
    const { arena, insert, records } = setup({
      generate: async () => ({ text: "ok", totalTokens: 1 }),
    });
    const session = arena.sessions.getOrCreate();
    await arena.playRound(session, "Hello");

    arena.castVote(session, "A");
    const second = arena.castVote(session, "B");

    expect(second).toMatchObject({ ok: false, reason: "already_voted" });
    expect(insert).toHaveBeenCalledTimes(1);
    expect(records.map((r) => r.vote)).toEqual(["A"]);
  });

  it("reveals nothing before the vote", async () => {
    const { arena } = setup({ generate: async () => ({ text: "ok", totalTokens: 1 }) });
    const session = arena.sessions.getOrCreate();
    await arena.playRound(session, "Hello");
    expect(arena.reveal(session)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

describe("Arena construction", () => {
  const store: VoteStore = { insert: async () => ({ ok: true }) };

  it("builds from the environment", () => {
    const arena = createArenaFromEnv(
      { store },
      { ARENA_API_KEY: "test-secret", ARENA_MODELS: "mistral:latest,phi4:latest" }
    );
    expect(arena).toBeInstanceOf(Arena);
    expect(arena.registry.ids()).toEqual(["mistral:latest", "phi4:latest"]);
    expect(arena.tracker.cooldownWindowMs).toBe(60_000);
  });

  it("fails fast without an API key", () => {
    expect(() => createArenaFromEnv({ store }, {})).toThrow(ConfigError);
  });

  it("fails fast with a single model", () => {
    expect(() =>
      createArena({ ...CONFIG, models: [MODELS[0]] }, { store })
    ).toThrow(ConfigError);
  });

  it("keeps one session per token", () => {
    const arena = createArena(CONFIG, { store });
    const a = arena.sessions.getOrCreate("token-a");
    expect(arena.sessions.getOrCreate("token-a")).toBe(a);
    expect(arena.sessions.get("token-a")).toBe(a);
    expect(arena.sessions.size).toBe(1);

    expect(arena.sessions.end("token-a")).toBe(true);
    expect(arena.sessions.get("token-a")).toBeNull();
    expect(arena.sessions.getOrCreate("token-a")).not.toBe(a);
  });

  it("drops sessions left idle past the TTL", () => {
    const { arena, setNow } = setup({
      generate: async () => ({ text: "unused", totalTokens: null }),
    });
    expect(arena.sessions.idleTtlMs).toBe(30 * 60_000);

    const stale = arena.sessions.getOrCreate("token-stale");
    const active = arena.sessions.getOrCreate("token-active");

    setNow(T0 + 20 * 60_000);
    expect(arena.sessions.get("token-active")).toBe(active);

    setNow(T0 + 30 * 60_000);
    expect(arena.sessions.prune()).toBe(1);
    expect(arena.sessions.size).toBe(1);
    expect(arena.sessions.get("token-stale")).toBeNull();
    expect(arena.sessions.get("token-active")).toBe(active);
    expect(arena.sessions.getOrCreate("token-stale")).not.toBe(stale);
  });
});
