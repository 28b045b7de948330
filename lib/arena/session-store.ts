/**
 * In-process table of arena sessions keyed by session token.
 *
 * Sessions hold no state worth persisting beyond the votes they emit. A
 * session untouched for `idleTtlMs` is dropped on the next lookup; `end()`
 * drops one immediately.
 */

import { ArenaSession, type ArenaSessionDeps } from "./round-session";
import type { Clock } from "./types";

export const DEFAULT_SESSION_IDLE_TTL_MS = 30 * 60_000;

interface Entry {
  session: ArenaSession;
  lastSeen: number;
}

export class ArenaSessionStore {
  private readonly sessions = new Map<string, Entry>();
  private readonly clock: Clock;

  constructor(
    private readonly deps: Omit<ArenaSessionDeps, "id">,
    readonly idleTtlMs: number = DEFAULT_SESSION_IDLE_TTL_MS
  ) {
    if (!(idleTtlMs > 0)) {
      throw new RangeError(`idleTtlMs must be positive, got ${idleTtlMs}`);
    }
    this.clock = deps.clock ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  get(token: string): ArenaSession | null {
    const now = this.clock();
    this.prune(now);
    const entry = this.sessions.get(token);
    if (!entry) return null;
    entry.lastSeen = now;
    return entry.session;
  }

  /** Look up a session, creating one when the token is unknown or absent. */
  getOrCreate(token?: string): ArenaSession {
    if (token) {
      const existing = this.get(token);
      if (existing) return existing;
    } else {
      this.prune(this.clock());
    }

    const session = new ArenaSession({ ...this.deps, id: token });
    this.sessions.set(session.id, { session, lastSeen: this.clock() });
    return session;
  }

  end(token: string): boolean {
    return this.sessions.delete(token);
  }

  /** Drop sessions idle for at least idleTtlMs. Returns how many were dropped. */
  prune(now: number = this.clock()): number {
    let dropped = 0;
    for (const [token, entry] of this.sessions) {
      if (now - entry.lastSeen >= this.idleTtlMs) {
        this.sessions.delete(token);
        dropped += 1;
      }
    }
    if (dropped > 0) {
      console.info(`[arena] dropped ${dropped} idle session(s)`);
    }
    return dropped;
  }
}
