/**
 * Round dispatcher.
 *
 * Sends the prompt to both models of a round at the same time and waits
 * until each side has settled: a success, a final failure, or retries
 * exhausted. One side's delay or failure never holds back the other.
 *
 * Throttle signals are recorded in the RateLimitTracker before any retry
 * so that concurrent selections already skip the model.
 */

import type {
  Clock,
  ChatMessage,
  RoundRequest,
  RoundResult,
  SideOutcome,
} from "./types";
import { RETRYABLE_FAILURES } from "./types";
import type { CompletionFn } from "./completion";
import { buildMessages } from "./prompt";
import type { RateLimitTracker } from "@/lib/rate-limit/tracker";

export interface DispatcherConfig {
  /** Retries after the first attempt, for transient failures only */
  maxRetries: number;
  /** Backoff before retry n (0-based) is retryBaseDelayMs * 2^n */
  retryBaseDelayMs: number;
}

export interface DispatcherDeps {
  complete: CompletionFn;
  tracker: RateLimitTracker;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RoundDispatcher {
  private readonly complete: CompletionFn;
  private readonly tracker: RateLimitTracker;
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: DispatcherConfig,
    deps: DispatcherDeps
  ) {
    this.complete = deps.complete;
    this.tracker = deps.tracker;
    this.clock = deps.clock ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Query both models and wait for both outcomes. Throttles are marked at the
   * injected clock's reading when each 429 is seen, not at `request.createdAt`.
   */
  async dispatch(request: RoundRequest): Promise<RoundResult> {
    if (request.modelA === request.modelB) {
      throw new Error(
        `Round models must differ, got "${request.modelA}" twice`
      );
    }

    const messages = buildMessages(request.prompt);

    // Both sides resolve (never reject), so Promise.all waits for the slower one
    const [A, B] = await Promise.all([
      this.runSide(request.modelA, messages),
      this.runSide(request.modelB, messages),
    ]);

    return { A, B };
  }

  /**
   * Query one model with retries. Always resolves.
   */
  async runSide(model: string, messages: ChatMessage[]): Promise<SideOutcome> {
    let attempt = 0;

    for (;;) {
      const outcome = await this.attempt(model, messages);
      attempt += 1;

      if (outcome.ok) return outcome;

      if (outcome.kind === "throttled") {
        this.tracker.markThrottled(model, this.clock());
        console.warn(`[dispatcher] ${model} throttled (attempt ${attempt})`);
      }

      const retriesUsed = attempt - 1;
      if (
        !RETRYABLE_FAILURES.has(outcome.kind) ||
        retriesUsed >= this.config.maxRetries
      ) {
        console.error(
          `[dispatcher] ${model} failed after ${attempt} attempt(s): ${outcome.kind}`
        );
        return { ...outcome, attempts: attempt };
      }

      const delayMs = this.config.retryBaseDelayMs * 2 ** retriesUsed;
      console.warn(
        `[dispatcher] retrying ${model} in ${delayMs}ms after ${outcome.kind}`
      );
      await this.sleep(delayMs);
    }
  }

  private async attempt(
    model: string,
    messages: ChatMessage[]
  ): Promise<SideOutcome> {
    try {
      return await this.complete(model, messages);
    } catch (error) {
      // CompletionFn should not throw; treat an escape as a transport failure
      return {
        ok: false,
        kind: "network_error",
        message: error instanceof Error ? error.message : String(error),
        attempts: 1,
      };
    }
  }
}
