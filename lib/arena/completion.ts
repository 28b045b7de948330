/**
 * Chat-completion client: the Vercel AI SDK pointed at an OpenAI-compatible
 * endpoint.
 *
 * One call, one attempt. Retries and throttle bookkeeping belong to the
 * dispatcher; this layer only enforces the timeout and turns every SDK
 * error into a FailureKind.
 */

import { createOpenAI } from "@ai-sdk/openai";
import {
  APICallError,
  InvalidResponseDataError,
  JSONParseError,
  TypeValidationError,
  generateText,
  type CoreMessage,
} from "ai";
import type { ChatMessage, FailureKind, SideOutcome } from "./types";

export interface CompletionClientConfig {
  apiBaseUrl: string;
  apiKey: string;
  requestTimeoutMs: number;
  /** Cap on reply length, in tokens. */
  maxTokens: number;
}

export interface GenerateRequest {
  model: string;
  messages: ChatMessage[];
  maxTokens: number;
  abortSignal: AbortSignal;
}

export interface GenerateResponse {
  text: string;
  totalTokens: number | null;
}

/** The raw upstream call. Swapped out in tests. */
export type GenerateFn = (request: GenerateRequest) => Promise<GenerateResponse>;

export type CompletionFn = (
  model: string,
  messages: ChatMessage[]
) => Promise<SideOutcome>;

function toCoreMessage(message: ChatMessage): CoreMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

/**
 * Build a GenerateFn backed by the AI SDK. SDK-level retries are disabled.
 */
export function createSdkGenerate(
  config: Pick<CompletionClientConfig, "apiBaseUrl" | "apiKey">
): GenerateFn {
  const provider = createOpenAI({
    baseURL: config.apiBaseUrl,
    apiKey: config.apiKey,
  });

  return async ({ model, messages, maxTokens, abortSignal }) => {
    const result = await generateText({
      model: provider.chat(model),
      messages: messages.map(toCoreMessage),
      maxTokens,
      maxRetries: 0,
      abortSignal,
    });

    const total = result.usage.totalTokens;
    return {
      text: result.text,
      totalTokens: Number.isFinite(total) ? total : null,
    };
  };
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

const RATE_LIMIT_PATTERN = /rate[_ ]?limit/i;

function mentionsRateLimit(payload: unknown): boolean {
  if (payload === undefined || payload === null) return false;
  if (typeof payload === "string") return RATE_LIMIT_PATTERN.test(payload);
  try {
    return RATE_LIMIT_PATTERN.test(JSON.stringify(payload));
  } catch {
    return false;
  }
}

/**
 * Map an error thrown by the upstream call to a FailureKind.
 *
 * A 429 and an embedded `rate_limit` error are both "throttled", whatever
 * status carried them.
 */
export function classifyCompletionError(
  error: unknown,
  timedOut: boolean
): FailureKind {
  if (timedOut) return "timeout";

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (
      status === 429 ||
      mentionsRateLimit(error.responseBody) ||
      mentionsRateLimit(error.data)
    ) {
      return "throttled";
    }
    if (status === undefined) return "network_error";
    if (status >= 500) return "server_error";
    if (status >= 200 && status < 300) return "invalid_response";
    return "api_error";
  }

  if (TypeValidationError.isInstance(error)) {
    return mentionsRateLimit(error.value) ? "throttled" : "invalid_response";
  }

  if (
    JSONParseError.isInstance(error) ||
    InvalidResponseDataError.isInstance(error)
  ) {
    return "invalid_response";
  }

  if (error instanceof TypeError) return "network_error";

  return "api_error";
}

/**
 * Settle with the abort reason as soon as the signal fires, even if the
 * underlying call ignores it.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/**
 * Create a single-attempt completion function.
 *
 * Only a non-empty completion text counts as success; an empty or
 * whitespace-only 200 response is "invalid_response".
 */
export function createCompletionClient(
  config: CompletionClientConfig,
  generate: GenerateFn = createSdkGenerate(config)
): CompletionFn {
  return async (model, messages) => {
    const abortSignal = AbortSignal.timeout(config.requestTimeoutMs);
    const start = Date.now();

    try {
      const response = await raceAbort(
        generate({ model, messages, maxTokens: config.maxTokens, abortSignal }),
        abortSignal
      );
      const latencyMs = Date.now() - start;

      if (response.text.trim().length === 0) {
        return {
          ok: false,
          kind: "invalid_response",
          message: "Response contained no completion text",
          attempts: 1,
        };
      }

      return {
        ok: true,
        text: response.text,
        latencyMs,
        tokenCount: response.totalTokens,
      };
    } catch (error) {
      const kind = classifyCompletionError(error, abortSignal.aborted);
      return {
        ok: false,
        kind,
        message:
          kind === "timeout"
            ? `Request timed out after ${config.requestTimeoutMs}ms`
            : errorMessage(error),
        attempts: 1,
      };
    }
  };
}
