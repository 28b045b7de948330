/**
 * Arena round orchestrator.
 *
 * playRound: validate → pick a pair → open the round → query both models in
 * parallel → hand the results back to the session, which drops them if a
 * newer prompt replaced the round meanwhile.
 */

import { loadArenaConfig, type ArenaConfig } from "@/lib/config";
import { RateLimitTracker } from "@/lib/rate-limit/tracker";
import type {
  Clock,
  Model,
  RandomSource,
  RoundState,
  VoteRecord,
  VoteStore,
} from "./types";
import { ModelRegistry } from "./registry";
import { ModelSelector } from "./selector";
import {
  createCompletionClient,
  type CompletionFn,
  type GenerateFn,
} from "./completion";
import { RoundDispatcher } from "./dispatcher";
import type {
  ArenaSession,
  CastVoteResult,
  RoundView,
  VoteStoreFailure,
} from "./round-session";
import { ArenaSessionStore } from "./session-store";
import { validatePrompt } from "./prompt";

export interface ArenaDeps {
  store: VoteStore;
  clock?: Clock;
  random?: RandomSource;
  /** Replaces the SDK call behind the completion client */
  generate?: GenerateFn;
  /** Replaces the completion client entirely */
  complete?: CompletionFn;
  onVoteStoreFailure?: (failure: VoteStoreFailure, record: VoteRecord) => void;
}

export type PlayRoundOutcome =
  | { ok: true; sequence: number; view: RoundView }
  | { ok: false; reason: "validation_error"; message: string }
  | {
      ok: false;
      reason: "insufficient_models";
      message: string;
      retryAfterSeconds: number;
    }
  | { ok: false; reason: "unchanged"; view: RoundView }
  | { ok: false; reason: "stale"; sequence: number }
  | { ok: false; reason: "invalid_transition"; state: RoundState };

export interface RevealedPair {
  A: Model;
  B: Model;
}

export class Arena {
  readonly registry: ModelRegistry;
  readonly tracker: RateLimitTracker;
  readonly selector: ModelSelector;
  readonly dispatcher: RoundDispatcher;
  readonly sessions: ArenaSessionStore;
  private readonly clock: Clock;

  constructor(
    private readonly config: ArenaConfig,
    deps: ArenaDeps
  ) {
    this.clock = deps.clock ?? Date.now;
    this.registry = new ModelRegistry(config.models);
    this.tracker = new RateLimitTracker(config.cooldownWindowMs);
    this.selector = new ModelSelector(this.registry, this.tracker, deps.random);

    const complete = deps.complete ?? createCompletionClient(config, deps.generate);
    this.dispatcher = new RoundDispatcher(
      { maxRetries: config.maxRetries, retryBaseDelayMs: config.retryBaseDelayMs },
      { complete, tracker: this.tracker, clock: this.clock }
    );

    this.sessions = new ArenaSessionStore(
      {
        store: deps.store,
        clock: this.clock,
        maxPromptLength: config.maxPromptLength,
        onVoteStoreFailure: deps.onVoteStoreFailure,
      },
      config.sessionIdleTtlMs
    );
  }

  async playRound(session: ArenaSession, prompt: unknown): Promise<PlayRoundOutcome> {
    const validation = validatePrompt(prompt, this.config.maxPromptLength);
    if (!validation.ok) return validation;

    if (!session.isNewPrompt(validation.prompt)) {
      return { ok: false, reason: "unchanged", view: session.view() };
    }

    const selection = this.selector.select(this.clock());
    if (!selection.ok) {
      console.warn(
        `[arena] only ${selection.eligible.length} model(s) available; asking to retry in ${selection.retryAfterSeconds}s`
      );
      return {
        ok: false,
        reason: "insufficient_models",
        message: `Not enough models are available right now. Try again in ${selection.retryAfterSeconds}s.`,
        retryAfterSeconds: selection.retryAfterSeconds,
      };
    }

    const submitted = session.submitPrompt(validation.prompt, selection);
    if (!submitted.ok) {
      return submitted.reason === "unchanged"
        ? { ok: false, reason: "unchanged", view: session.view() }
        : submitted;
    }

    console.info(`[arena] session ${session.id} round ${submitted.sequence} dispatching`);
    const result = await this.dispatcher.dispatch(submitted.request);

    const delivered = session.resultsReady(submitted.sequence, result);
    if (!delivered.ok) {
      return delivered.reason === "stale"
        ? { ok: false, reason: "stale", sequence: submitted.sequence }
        : delivered;
    }

    return { ok: true, sequence: submitted.sequence, view: session.view() };
  }

  castVote(session: ArenaSession, choice: unknown): CastVoteResult {
    return session.castVote(choice);
  }

  /** Model metadata for a voted round; null until the vote is in. */
  reveal(session: ArenaSession): RevealedPair | null {
    const revealed = session.current.revealedModels();
    if (!revealed) return null;

    const A = this.registry.get(revealed.A);
    const B = this.registry.get(revealed.B);
    return A && B ? { A, B } : null;
  }
}

export function createArena(config: ArenaConfig, deps: ArenaDeps): Arena {
  return new Arena(config, deps);
}

/** Build an arena from ARENA_* environment variables. Throws ConfigError. */
export function createArenaFromEnv(
  deps: ArenaDeps,
  env: NodeJS.ProcessEnv = process.env
): Arena {
  return new Arena(loadArenaConfig(env), deps);
}
