export type {
  PageId,
  FrameState,
  PolicyName,
  SimulationConfig,
  StepRecord,
  SimulationResult,
  ReplacementPolicy,
  SimulationSummary,
  PolicyComparison,
  ReplayMismatch,
  Breakpoint,
  BreakpointCondition,
} from "./types.js";

export {
  SimulationError,
  InvalidFrameCountError,
  InvalidPageError,
  UnknownPolicyError,
  InvalidReferenceError,
  isPageId,
} from "./errors.js";
export type { SimulationErrorCode } from "./errors.js";

export { FrameTable, EMPTY_FRAME, emptyFrameState } from "./frame-table.js";
export { RecencyList } from "./recency-list.js";
export { PagingPolicy } from "./paging-policy.js";
export { LruPolicy } from "./lru-policy.js";
export { OptimalPolicy, nextUse } from "./optimal-policy.js";
export { simulate, createPolicy, compare } from "./simulate.js";
export { summarize, formatPercent } from "./metrics.js";
export { replayStep, verifyHistory } from "./replay.js";
export { ReplaySession } from "./replay-session.js";
export {
  parseSimulationConfig,
  validateReferenceSequence,
  simulationConfigSchema,
  policyNameSchema,
  referenceSequenceSchema,
} from "./config.js";
export {
  loadEnv,
  loadDotenv,
  resolveLogLevel,
  envSchema,
  logLevelSchema,
} from "./env.js";
export type { Env, LoadEnvOptions, LogLevelResolution } from "./env.js";
export { logger, createLogger } from "./logger.js";
export type { LogLevel } from "./logger.js";
