export * from "./arena/types";
export { DEFAULT_MODELS } from "./arena/models";
export { ModelRegistry, MIN_MODELS } from "./arena/registry";
export { ModelSelector, drawPair, type SelectionResult } from "./arena/selector";
export {
  createCompletionClient,
  createSdkGenerate,
  classifyCompletionError,
  type CompletionFn,
  type GenerateFn,
} from "./arena/completion";
export { RoundDispatcher, type DispatcherConfig } from "./arena/dispatcher";
export {
  ArenaSession,
  RoundSession,
  type CastVoteResult,
  type ResultsReadyResult,
  type RoundView,
  type SubmitResult,
  type VoteStoreFailure,
} from "./arena/round-session";
export { ArenaSessionStore, DEFAULT_SESSION_IDLE_TTL_MS } from "./arena/session-store";
export { hashPrompt, promptLength, validatePrompt } from "./arena/prompt";
export {
  Arena,
  createArena,
  createArenaFromEnv,
  type ArenaDeps,
  type PlayRoundOutcome,
} from "./arena/orchestrator";
export { RateLimitTracker } from "./rate-limit/tracker";
export {
  ArenaConfigSchema,
  ConfigError,
  loadArenaConfig,
  parseArenaConfig,
  type ArenaConfig,
} from "./config";
