/**
 * Round state machine.
 *
 *   idle ──submitPrompt──▶ dispatching ──resultsReady──▶ awaiting_vote ──castVote──▶ voted
 *
 * RoundSession covers exactly one prompt. ArenaSession owns the sequence of
 * rounds for one user interaction: a prompt with a different content hash
 * replaces the current round with a fresh one, and results are routed by
 * round sequence number so a late result for a replaced round is dropped.
 *
 * Every transition is a synchronous method, so transitions on one session
 * never interleave. Vote persistence runs after the state has moved to
 * voted and never feeds back into it.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type {
  Clock,
  RoundRequest,
  RoundResult,
  RoundSide,
  RoundState,
  SideOutcome,
  VoteChoice,
  VoteRecord,
  VoteStore,
  VoteStoreResult,
} from "./types";
import { ROUND_SIDES, VOTE_CHOICES } from "./types";
import {
  DEFAULT_MAX_PROMPT_LENGTH,
  buildRoundId,
  hashPrompt,
  validatePrompt,
} from "./prompt";

export type VoteStoreFailure = Extract<VoteStoreResult, { ok: false }>;

export interface RoundSessionDeps {
  store: VoteStore;
  clock?: Clock;
  maxPromptLength?: number;
  sessionId?: string;
  /** Observability hook for failed vote inserts */
  onVoteStoreFailure?: (failure: VoteStoreFailure, record: VoteRecord) => void;
}

export interface ModelPair {
  modelA: string;
  modelB: string;
}

export interface RevealedModels {
  A: string;
  B: string;
}

export type InvalidTransition = {
  ok: false;
  reason: "invalid_transition";
  state: RoundState;
};

export type SubmitResult =
  | { ok: true; sequence: number; request: RoundRequest }
  | { ok: false; reason: "validation_error"; message: string }
  | { ok: false; reason: "unchanged"; sequence: number; state: RoundState }
  | InvalidTransition;

export type ResultsReadyResult =
  | { ok: true; sequence: number }
  | { ok: false; reason: "stale"; sequence: number; current: number }
  | InvalidTransition;

export type CastVoteResult =
  | { ok: true; record: VoteRecord; revealed: RevealedModels }
  | { ok: false; reason: "already_voted"; record: VoteRecord }
  | { ok: false; reason: "invalid_choice"; message: string }
  | InvalidTransition;

export interface SideView {
  side: RoundSide;
  label: string;
  /** Concealed (null) until the round is voted */
  model: string | null;
  outcome: SideOutcome | null;
}

export interface RoundView {
  sequence: number;
  state: RoundState;
  prompt: string | null;
  sides: SideView[];
  vote: VoteChoice | null;
  revealed: RevealedModels | null;
}

const VoteChoiceSchema = z.enum(VOTE_CHOICES, {
  errorMap: () => ({ message: `Vote must be one of ${VOTE_CHOICES.join(", ")}` }),
});

// ---------------------------------------------------------------------------
// RoundSession: one prompt
// ---------------------------------------------------------------------------

export class RoundSession {
  private current: RoundState = "idle";
  private roundRequest: RoundRequest | null = null;
  private roundResult: RoundResult | null = null;
  private voteRecord: VoteRecord | null = null;
  private pendingPersistence: Promise<VoteStoreResult> | null = null;
  private readonly clock: Clock;

  constructor(
    readonly sequence: number,
    private readonly deps: RoundSessionDeps
  ) {
    this.clock = deps.clock ?? Date.now;
  }

  get state(): RoundState {
    return this.current;
  }

  get request(): RoundRequest | null {
    return this.roundRequest;
  }

  get result(): RoundResult | null {
    return this.roundResult;
  }

  get vote(): VoteRecord | null {
    return this.voteRecord;
  }

  get promptHash(): string | null {
    return this.roundRequest?.promptHash ?? null;
  }

  /** Settles once the vote insert has finished; null before voting. */
  get persistence(): Promise<VoteStoreResult> | null {
    return this.pendingPersistence;
  }

  submitPrompt(text: unknown, pair: ModelPair): SubmitResult {
    if (this.current !== "idle") {
      return { ok: false, reason: "invalid_transition", state: this.current };
    }

    const validation = validatePrompt(
      text,
      this.deps.maxPromptLength ?? DEFAULT_MAX_PROMPT_LENGTH
    );
    if (!validation.ok) return validation;

    if (pair.modelA === pair.modelB) {
      throw new Error(`Round models must differ, got "${pair.modelA}" twice`);
    }

    this.roundRequest = Object.freeze({
      prompt: validation.prompt,
      promptHash: hashPrompt(validation.prompt),
      modelA: pair.modelA,
      modelB: pair.modelB,
      createdAt: this.clock(),
    });
    this.current = "dispatching";

    return { ok: true, sequence: this.sequence, request: this.roundRequest };
  }

  /**
   * Accept dispatch results. Succeeds whatever the per-side outcomes; a
   * failed side is shown as an error and does not block voting.
   */
  resultsReady(result: RoundResult): ResultsReadyResult {
    if (this.current !== "dispatching") {
      return { ok: false, reason: "invalid_transition", state: this.current };
    }

    this.roundResult = result;
    this.current = "awaiting_vote";
    return { ok: true, sequence: this.sequence };
  }

  /**
   * Record the user's preference. Only the first valid vote counts; later
   * calls return "already_voted" and change nothing.
   */
  castVote(choice: unknown): CastVoteResult {
    if (this.current === "voted" && this.voteRecord) {
      return { ok: false, reason: "already_voted", record: this.voteRecord };
    }

    if (this.current !== "awaiting_vote" || !this.roundRequest) {
      return { ok: false, reason: "invalid_transition", state: this.current };
    }

    const parsed = VoteChoiceSchema.safeParse(choice);
    if (!parsed.success) {
      return {
        ok: false,
        reason: "invalid_choice",
        message: parsed.error.issues[0]?.message ?? "Invalid vote",
      };
    }

    const request = this.roundRequest;
    const record: VoteRecord = Object.freeze({
      roundId: buildRoundId(request.promptHash, request.createdAt),
      vote: parsed.data,
      modelA: request.modelA,
      modelB: request.modelB,
      promptHash: request.promptHash,
      votedAt: this.clock(),
      ...(this.deps.sessionId ? { sessionId: this.deps.sessionId } : {}),
    });

    this.voteRecord = record;
    this.current = "voted";
    this.pendingPersistence = this.persist(record);

    return { ok: true, record, revealed: { A: request.modelA, B: request.modelB } };
  }

  revealedModels(): RevealedModels | null {
    if (this.current !== "voted" || !this.roundRequest) return null;
    return { A: this.roundRequest.modelA, B: this.roundRequest.modelB };
  }

  view(): RoundView {
    const revealed = this.revealedModels();
    return {
      sequence: this.sequence,
      state: this.current,
      prompt: this.roundRequest?.prompt ?? null,
      sides: ROUND_SIDES.map((side) => ({
        side,
        label: `Model ${side}`,
        model: revealed ? revealed[side] : null,
        outcome: this.roundResult ? this.roundResult[side] : null,
      })),
      vote: this.voteRecord?.vote ?? null,
      revealed,
    };
  }

  /**
   * Issue the insert without blocking the caller. Failures are logged and
   * reported through onVoteStoreFailure; the round stays voted.
   */
  private persist(record: VoteRecord): Promise<VoteStoreResult> {
    let pending: Promise<VoteStoreResult>;
    try {
      pending = this.deps.store.insert(record);
    } catch (error) {
      pending = Promise.reject(error);
    }

    return pending.then(
      (result) => {
        if (result.ok) {
          console.info(`[arena] vote ${record.vote} saved for round ${record.roundId}`);
        } else {
          this.reportFailure(result, record);
        }
        return result;
      },
      (error: unknown) => {
        const failure: VoteStoreFailure = {
          ok: false,
          kind: "write_failed",
          message: error instanceof Error ? error.message : String(error),
        };
        this.reportFailure(failure, record);
        return failure;
      }
    );
  }

  private reportFailure(failure: VoteStoreFailure, record: VoteRecord): void {
    console.error(
      `[arena] failed to save vote for round ${record.roundId}: ${failure.kind} (${failure.message})`
    );
    try {
      this.deps.onVoteStoreFailure?.(failure, record);
    } catch (hookError) {
      console.error("[arena] onVoteStoreFailure hook threw:", hookError);
    }
  }
}

// ---------------------------------------------------------------------------
// ArenaSession: one user interaction, many rounds
// ---------------------------------------------------------------------------

export interface ArenaSessionDeps extends Omit<RoundSessionDeps, "sessionId"> {
  id?: string;
}

export class ArenaSession {
  readonly id: string;
  private lastSequence = 0;
  private round: RoundSession;
  private readonly deps: RoundSessionDeps;

  constructor(deps: ArenaSessionDeps) {
    const { id, ...rest } = deps;
    this.id = id ?? randomUUID();
    this.deps = { ...rest, sessionId: this.id };
    this.round = this.freshRound();
  }

  get current(): RoundSession {
    return this.round;
  }

  get state(): RoundState {
    return this.round.state;
  }

  /**
   * A prompt is new when no round is under way or its content hash differs
   * from the current round's prompt.
   */
  isNewPrompt(text: string): boolean {
    return this.round.state === "idle" || this.round.promptHash !== hashPrompt(text);
  }

  submitPrompt(text: unknown, pair: ModelPair): SubmitResult {
    const validation = validatePrompt(
      text,
      this.deps.maxPromptLength ?? DEFAULT_MAX_PROMPT_LENGTH
    );
    if (!validation.ok) return validation;

    if (!this.isNewPrompt(validation.prompt)) {
      return {
        ok: false,
        reason: "unchanged",
        sequence: this.round.sequence,
        state: this.round.state,
      };
    }

    if (this.round.state !== "idle") {
      console.info(
        `[arena] new prompt in session ${this.id}; discarding round ${this.round.sequence} (${this.round.state})`
      );
      this.round = this.freshRound();
    }

    return this.round.submitPrompt(validation.prompt, pair);
  }

  /**
   * Deliver dispatch results for round `sequence`. Results for any round
   * other than the current one are dropped.
   */
  resultsReady(sequence: number, result: RoundResult): ResultsReadyResult {
    if (sequence !== this.round.sequence) {
      console.warn(
        `[arena] dropping stale results for round ${sequence} (current ${this.round.sequence})`
      );
      return { ok: false, reason: "stale", sequence, current: this.round.sequence };
    }
    return this.round.resultsReady(result);
  }

  castVote(choice: unknown): CastVoteResult {
    return this.round.castVote(choice);
  }

  /** Abandon the current round and start over with a fresh idle one. */
  reset(): RoundSession {
    this.round = this.freshRound();
    return this.round;
  }

  view(): RoundView {
    return this.round.view();
  }

  private freshRound(): RoundSession {
    this.lastSequence += 1;
    return new RoundSession(this.lastSequence, this.deps);
  }
}
