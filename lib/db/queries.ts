/**
 * Vote repository functions.
 *
 * All database access goes through these functions; there are no raw queries
 * elsewhere in the codebase.
 */

import { count, desc } from "drizzle-orm";
import { db } from "./index";
import { votes } from "./schema";
import type { VoteChoice, VoteRecord, VoteStore } from "@/lib/arena/types";

export async function insertVote(record: VoteRecord) {
  const [row] = await db
    .insert(votes)
    .values({
      roundId: record.roundId,
      sessionId: record.sessionId ?? null,
      modelA: record.modelA,
      modelB: record.modelB,
      promptHash: record.promptHash,
      vote: record.vote,
      createdAt: new Date(record.votedAt),
    })
    .returning({ id: votes.id });
  return row ?? null;
}

export async function countVotes(): Promise<number> {
  const [row] = await db.select({ count: count() }).from(votes);
  return row?.count ?? 0;
}

export async function countVotesByChoice(): Promise<Record<VoteChoice, number>> {
  const rows = await db
    .select({ vote: votes.vote, count: count() })
    .from(votes)
    .groupBy(votes.vote)
    .orderBy(desc(count()));

  const totals: Record<VoteChoice, number> = { A: 0, B: 0, Tie: 0, BothBad: 0 };
  for (const row of rows) {
    totals[row.vote] = row.count;
  }
  return totals;
}

/**
 * VoteStore backed by the votes table. Never throws; database errors come
 * back as a failed result.
 */
export const dbVoteStore: VoteStore = {
  async insert(record) {
    try {
      const row = await insertVote(record);
      if (!row) {
        return {
          ok: false,
          kind: "not_acknowledged",
          message: "Insert returned no row",
        };
      }
      return { ok: true };
    } catch (error) {
      console.error(`[votes] insert failed for round ${record.roundId}:`, error);
      return {
        ok: false,
        kind: "write_failed",
        message: error instanceof Error ? error.message : String(error),
      };
    }
  },
};
