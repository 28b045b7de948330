/**
 * Per-model throttle tracker.
 *
 * One entry per model: the timestamp of the latest throttle signal.
 * Entries are never swept; an entry older than the cooldown window is
 * simply ignored on read. Timestamps only move forward, so a late write
 * carrying an older timestamp cannot shorten an active cooldown.
 */

import { DEFAULT_COOLDOWN_WINDOW_MS, type ThrottleStatus } from "./config";

export class RateLimitTracker {
  private readonly lastThrottle = new Map<string, number>();

  constructor(readonly cooldownWindowMs: number = DEFAULT_COOLDOWN_WINDOW_MS) {
    if (!(cooldownWindowMs > 0)) {
      throw new RangeError("cooldownWindowMs must be positive");
    }
  }

  isThrottled(modelId: string, now: number): boolean {
    return this.status(modelId, now).throttled;
  }

  status(modelId: string, now: number): ThrottleStatus {
    const last = this.lastThrottle.get(modelId);
    if (last === undefined) return { throttled: false, remainingMs: 0 };

    const remainingMs = last + this.cooldownWindowMs - now;
    return remainingMs > 0
      ? { throttled: true, remainingMs }
      : { throttled: false, remainingMs: 0 };
  }

  markThrottled(modelId: string, now: number): void {
    const last = this.lastThrottle.get(modelId);
    if (last !== undefined && last >= now) return;
    this.lastThrottle.set(modelId, now);
  }
}
