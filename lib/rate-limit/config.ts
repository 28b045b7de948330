/**
 * Throttle cooldown configuration.
 *
 * When the completion API signals rate limiting for a model, that model
 * sits out of pair selection for one cooldown window.
 */

/** Default cooldown after a throttle signal (60s) */
export const DEFAULT_COOLDOWN_WINDOW_MS = 60_000;

export interface ThrottleStatus {
  throttled: boolean;
  /** Milliseconds until the model is eligible again (0 when not throttled) */
  remainingMs: number;
}
