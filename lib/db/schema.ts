/**
 * Drizzle ORM schema for arena votes.
 *
 * One row per finalized vote. Rows are written once and never updated.
 */

import { randomUUID } from "node:crypto";
import { pgTable, text, timestamp, index } from "drizzle-orm/pg-core";
import { VOTE_CHOICES } from "@/lib/arena/types";

export const votes = pgTable(
  "votes",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => randomUUID()),
    roundId: text("round_id").notNull(),
    sessionId: text("session_id"),
    modelA: text("model_a").notNull(),
    modelB: text("model_b").notNull(),
    promptHash: text("prompt_hash").notNull(),
    vote: text("vote", { enum: VOTE_CHOICES }).notNull(),
    createdAt: timestamp("created_at", { mode: "date" }).defaultNow().notNull(),
  },
  (t) => [
    index("votes_created_models_idx").on(t.createdAt, t.modelA, t.modelB),
    index("votes_prompt_hash_idx").on(t.promptHash),
    index("votes_vote_created_idx").on(t.vote, t.createdAt),
  ]
);

export type VoteRow = typeof votes.$inferSelect;
export type NewVoteRow = typeof votes.$inferInsert;
