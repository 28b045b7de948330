/**
 * Prompt validation and hashing.
 */

import { createHash } from "node:crypto";
import { z } from "zod";
import type { ChatMessage } from "./types";

export const DEFAULT_MAX_PROMPT_LENGTH = 2_000;

/** Length in code points, so an emoji counts as one character. */
export function promptLength(text: string): number {
  return [...text].length;
}

export function promptSchema(maxLength: number = DEFAULT_MAX_PROMPT_LENGTH) {
  return z
    .string()
    .refine((text) => text.trim().length > 0, "Prompt cannot be empty")
    .refine(
      (text) => promptLength(text) <= maxLength,
      `Prompt too long (max ${maxLength.toLocaleString("en-US")} characters)`
    );
}

export type PromptValidation =
  | { ok: true; prompt: string }
  | { ok: false; reason: "validation_error"; message: string };

export function validatePrompt(
  text: unknown,
  maxLength: number = DEFAULT_MAX_PROMPT_LENGTH
): PromptValidation {
  const parsed = promptSchema(maxLength).safeParse(text);
  if (!parsed.success) {
    return {
      ok: false,
      reason: "validation_error",
      message: parsed.error.issues[0]?.message ?? "Invalid prompt",
    };
  }
  return { ok: true, prompt: parsed.data };
}

/** SHA-256 of the prompt text, hex encoded. */
export function hashPrompt(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

/** Round id: prompt hash prefix plus creation time. */
export function buildRoundId(promptHash: string, createdAt: number): string {
  return `${promptHash.slice(0, 16)}-${createdAt}`;
}

export function buildMessages(prompt: string): ChatMessage[] {
  return [{ role: "user", content: prompt }];
}
