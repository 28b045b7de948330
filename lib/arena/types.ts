/**
 * Core type definitions for the blind arena.
 *
 * Round lifecycle:
 *   select two unthrottled models → dispatch the prompt to both in parallel
 *   → show anonymized responses → record one vote → reveal identities
 */

// ---------------------------------------------------------------------------
// Models
// ---------------------------------------------------------------------------

export interface Model {
  id: string; // e.g. "qwen2.5:72b"
  name: string;
  category: string;
  contextLength: number;
}

// ---------------------------------------------------------------------------
// Chat messages
// ---------------------------------------------------------------------------

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

// ---------------------------------------------------------------------------
// Rounds
// ---------------------------------------------------------------------------

export const ROUND_SIDES = ["A", "B"] as const;
export type RoundSide = (typeof ROUND_SIDES)[number];

export interface RoundRequest {
  readonly prompt: string;
  readonly promptHash: string;
  readonly modelA: string;
  readonly modelB: string;
  /** Epoch ms */
  readonly createdAt: number;
}

export const FAILURE_KINDS = [
  "timeout",
  "throttled",
  "server_error",
  "network_error",
  "invalid_response",
  "api_error",
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

/** Failure kinds worth another attempt. Timeouts are final. */
export const RETRYABLE_FAILURES: ReadonlySet<FailureKind> = new Set([
  "throttled",
  "server_error",
  "network_error",
]);

export interface SideSuccess {
  ok: true;
  text: string;
  latencyMs: number;
  tokenCount: number | null;
}

export interface SideFailure {
  ok: false;
  kind: FailureKind;
  message: string;
  attempts: number;
}

export type SideOutcome = SideSuccess | SideFailure;

export interface RoundResult {
  A: SideOutcome;
  B: SideOutcome;
}

// ---------------------------------------------------------------------------
// Votes
// ---------------------------------------------------------------------------

export const VOTE_CHOICES = ["A", "B", "Tie", "BothBad"] as const;
export type VoteChoice = (typeof VOTE_CHOICES)[number];

/** Written once per round and never updated. */
export interface VoteRecord {
  readonly roundId: string;
  readonly vote: VoteChoice;
  readonly modelA: string;
  readonly modelB: string;
  readonly promptHash: string;
  /** Epoch ms */
  readonly votedAt: number;
  readonly sessionId?: string;
}

export type VoteStoreResult =
  | { ok: true }
  | { ok: false; kind: "write_failed" | "not_acknowledged"; message: string };

/**
 * Persistence boundary for finalized votes. Called at most once per round;
 * a retried insert after an ambiguous failure may land twice.
 */
export interface VoteStore {
  insert(record: VoteRecord): Promise<VoteStoreResult>;
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export const ROUND_STATES = [
  "idle",
  "dispatching",
  "awaiting_vote",
  "voted",
] as const;
export type RoundState = (typeof ROUND_STATES)[number];

export type Clock = () => number;
export type RandomSource = () => number;
