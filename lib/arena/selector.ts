/**
 * Pair selection for a round.
 *
 * Draws two distinct models uniformly from those not currently throttled.
 * The draw is ordered, so the first pick becomes slot A and the second
 * slot B: position carries no information about identity.
 */

import type { RandomSource } from "./types";
import type { ModelRegistry } from "./registry";
import type { RateLimitTracker } from "@/lib/rate-limit/tracker";

export type SelectionResult =
  | { ok: true; modelA: string; modelB: string }
  | {
      ok: false;
      reason: "insufficient_models";
      eligible: string[];
      retryAfterSeconds: number;
    };

function randomIndex(random: RandomSource, length: number): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

/**
 * Pure pair draw over an explicit snapshot of eligible ids.
 * Returns null when fewer than two ids are given.
 */
export function drawPair(
  eligible: readonly string[],
  random: RandomSource = Math.random
): [string, string] | null {
  if (eligible.length < 2) return null;

  const first = randomIndex(random, eligible.length);
  let second = randomIndex(random, eligible.length - 1);
  if (second >= first) second += 1;

  return [eligible[first], eligible[second]];
}

export class ModelSelector {
  constructor(
    private readonly registry: ModelRegistry,
    private readonly tracker: RateLimitTracker,
    private readonly random: RandomSource = Math.random
  ) {}

  eligibleIds(now: number): string[] {
    return this.registry.ids().filter((id) => !this.tracker.isThrottled(id, now));
  }

  select(now: number): SelectionResult {
    const eligible = this.eligibleIds(now);
    const pair = drawPair(eligible, this.random);

    if (!pair) {
      return {
        ok: false,
        reason: "insufficient_models",
        eligible,
        retryAfterSeconds: this.secondsUntilPairAvailable(now, eligible.length),
      };
    }

    return { ok: true, modelA: pair[0], modelB: pair[1] };
  }

  /**
   * Seconds until enough throttled models cool down to form a pair.
   */
  private secondsUntilPairAvailable(now: number, eligibleCount: number): number {
    const waits = this.registry
      .ids()
      .map((id) => this.tracker.status(id, now))
      .filter((s) => s.throttled)
      .map((s) => s.remainingMs)
      .sort((a, b) => a - b);

    const needed = 2 - eligibleCount;
    const waitMs = waits[needed - 1] ?? 0;
    return Math.max(1, Math.ceil(waitMs / 1000));
  }
}
