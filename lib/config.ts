/**
 * Arena configuration.
 *
 * Supplied as a plain object (or read from ARENA_* environment variables)
 * and validated once at startup. Any problem here is fatal.
 */

import { z } from "zod";
import { DEFAULT_MODELS } from "@/lib/arena/models";
import { DEFAULT_SESSION_IDLE_TTL_MS } from "@/lib/arena/session-store";
import { DEFAULT_COOLDOWN_WINDOW_MS } from "@/lib/rate-limit/config";

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid arena configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const ModelSchema = z.object({
  id: z.string().min(1, "Model id must not be empty"),
  name: z.string().min(1),
  category: z.string().min(1),
  contextLength: z.number().int().positive(),
});

export const ArenaConfigSchema = z.object({
  apiBaseUrl: z.string().url().default("https://openrouter.ai/api/v1"),
  apiKey: z
    .string({ required_error: "API key is required" })
    .min(1, "API key is required"),
  cooldownWindowMs: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_COOLDOWN_WINDOW_MS),
  requestTimeoutMs: z.coerce.number().int().positive().default(60_000),
  maxRetries: z.coerce.number().int().min(0).max(10).default(2),
  retryBaseDelayMs: z.coerce.number().int().min(0).default(1_000),
  maxPromptLength: z.coerce.number().int().min(1).max(10_000).default(2_000),
  maxTokens: z.coerce.number().int().positive().default(2_000),
  sessionIdleTtlMs: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_SESSION_IDLE_TTL_MS),
  models: z.array(ModelSchema).default(DEFAULT_MODELS),
});

export type ArenaConfig = z.infer<typeof ArenaConfigSchema>;
export type ArenaConfigInput = z.input<typeof ArenaConfigSchema>;

export function parseArenaConfig(input: unknown): ArenaConfig {
  const parsed = ArenaConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message
      )
    );
  }
  return parsed.data;
}

/**
 * Resolve a comma-separated list of catalog ids. Unknown ids are errors.
 */
function pickModels(list: string) {
  const ids = list
    .split(",")
    .map((id) => id.trim())
    .filter(Boolean);

  const unknown = ids.filter((id) => !DEFAULT_MODELS.some((m) => m.id === id));
  if (unknown.length > 0) {
    throw new ConfigError(
      unknown.map((id) => `ARENA_MODELS: unknown model "${id}"`)
    );
  }

  return DEFAULT_MODELS.filter((m) => ids.includes(m.id));
}

export function loadArenaConfig(
  env: NodeJS.ProcessEnv = process.env
): ArenaConfig {
  const input: Record<string, unknown> = {
    apiBaseUrl: env.ARENA_API_BASE_URL || undefined,
    apiKey: env.ARENA_API_KEY,
    cooldownWindowMs: env.ARENA_COOLDOWN_MS || undefined,
    requestTimeoutMs: env.ARENA_REQUEST_TIMEOUT_MS || undefined,
    maxRetries: env.ARENA_MAX_RETRIES || undefined,
    retryBaseDelayMs: env.ARENA_RETRY_BASE_DELAY_MS || undefined,
    maxPromptLength: env.ARENA_MAX_PROMPT_LENGTH || undefined,
    maxTokens: env.ARENA_MAX_TOKENS || undefined,
    sessionIdleTtlMs: env.ARENA_SESSION_IDLE_TTL_MS || undefined,
  };

  if (env.ARENA_MODELS) {
    input.models = pickModels(env.ARENA_MODELS);
  }

  return parseArenaConfig(input);
}
