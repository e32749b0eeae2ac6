/**
 * Concord: public API.
 *
 * Re-exports the engine for programmatic use, plus `runDiscussion`, the
 * one-call entry point: topic, roles, turn limit, window size and threshold in,
 * final history and consensus decision out.
 */

import { ConfigSchema, getCheckpointDir, type Config, type RoleConfig } from "./config.js";
import { createGenerator } from "./adapters/index.js";
import type { IGenerator } from "./adapters/base.js";
import { FileCheckpointStore } from "./store/file.js";
import type { ICheckpointStore } from "./store/interfaces.js";
import { DiscussionSession, type DiscussionResult } from "./orchestrator.js";
import type { ISummarizer } from "./context/compressor.js";
import { resolveRoles } from "./roles.js";

export interface RunDiscussionOptions {
  topic: string;
  /** Role ids (resolved against built-in and configured roles) or full descriptors */
  roles: Array<string | RoleConfig>;
  maxTurns?: number;
  windowSize?: number;
  threshold?: number;
  sessionId?: string;
  signal?: AbortSignal;
  /** Defaults to ConfigSchema defaults */
  config?: Config;
  /** Defaults to the configured generator */
  generator?: IGenerator;
  /** Defaults to a FileCheckpointStore in the configured directory */
  store?: ICheckpointStore;
  summarizer?: ISummarizer | null;
}

export async function runDiscussion(options: RunDiscussionOptions): Promise<DiscussionResult> {
  const config = options.config ?? ConfigSchema.parse({});
  const roles = options.roles.map((r) => (typeof r === "string" ? resolveRoles([r], config)[0] : r));
  const generator = options.generator ?? createGenerator(config.generator);
  const store = options.store ?? new FileCheckpointStore(getCheckpointDir(config));

  const session = new DiscussionSession(
    { generator, store, summarizer: options.summarizer },
    config.discussion,
    config.budget,
  );
  return session.run({
    topic: options.topic,
    roles,
    maxTurns: options.maxTurns,
    windowSize: options.windowSize,
    threshold: options.threshold,
    sessionId: options.sessionId,
    signal: options.signal,
  });
}

// --- Engine ---
export { DiscussionSession } from "./orchestrator.js";
export type {
  DiscussionOptions,
  DiscussionDeps,
  DiscussionResult,
  EstimateResult,
  TerminalStatus,
} from "./orchestrator.js";

// --- State ---
export { createState, appendMessage, checkInvariants } from "./discussion/state.js";
export type {
  Message,
  DiscussionState,
  DiscussionStatus,
  ConsensusDetail,
  Observation,
  DeadlockInfo,
} from "./discussion/state.js";

// --- Store ---
export { FileCheckpointStore } from "./store/file.js";
export { CheckpointSchema, parseCheckpoint, toCheckpoint } from "./store/checkpoint.js";
export type { ICheckpointStore, CheckpointSummary } from "./store/interfaces.js";

// --- Context ---
export { ContextCompressor, GenerativeSummarizer, fallbackSummary } from "./context/compressor.js";
export type { ISummarizer } from "./context/compressor.js";

// --- Consensus ---
export { ConsensusDetector } from "./consensus/detector.js";
export { GenerativeConsensusCheck } from "./consensus/llm-check.js";
export { detectDeadlock } from "./consensus/deadlock.js";
export type { IConsensusChecker } from "./consensus/llm-check.js";
export type { ConsensusDecision, ConsensusInput, IConsensusDetector } from "./consensus/base.js";

// --- Generators ---
export { createGenerator, OllamaAdapter, OpenAICompatAdapter, RetryingGenerator, Backoff } from "./adapters/index.js";
export type { IGenerator, GenerateOptions, GenerateResult, TokenUsage } from "./adapters/base.js";

// --- Roles ---
export {
  BUILTIN_ROLES,
  getRole,
  resolveRoles,
  listRoles,
  selectRolesForTopic,
  computeExpertiseWeights,
  buildRoleDescription,
} from "./roles.js";

// --- Config ---
export { loadConfig, getUserDataDir, getCheckpointDir, ConfigSchema } from "./config.js";
export type { Config, RoleConfig, GeneratorConfig, DiscussionConfig } from "./config.js";

// --- Errors ---
export * from "./errors.js";
