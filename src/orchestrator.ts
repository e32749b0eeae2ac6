/**
 * DiscussionSession: drives one discussion between roles to a terminal state.
 *
 *   INIT ──▶ RUNNING ──▶ CONSENSUS | EXHAUSTED | ABORTED
 *
 * Responsibilities:
 * - Validate roles and load (or create) the session checkpoint
 * - Take turns round-robin, one generation call at a time
 * - Fold old messages into the summary after every append
 * - Run consensus and deadlock checks on round boundaries
 * - Persist the checkpoint after every turn and honour the token budget
 *
 * A failed generation call ends the run as ABORTED; the checkpoint keeps the
 * last completed turn so the session can be resumed.
 */

import { randomUUID } from "node:crypto";
import type { IGenerator, TokenUsage } from "./adapters/base.js";
import { addUsage, estimateTokens, totalTokens } from "./adapters/base.js";
import {
  ConfigSchema,
  type BudgetConfig,
  type DiscussionConfig,
  type RoleConfig,
} from "./config.js";
import type { ICheckpointStore } from "./store/interfaces.js";
import {
  appendMessage,
  pushObservation,
  type ConsensusDetail,
  type DiscussionState,
  type DiscussionStatus,
  type Message,
} from "./discussion/state.js";
import { ContextCompressor, GenerativeSummarizer, type ISummarizer } from "./context/compressor.js";
import type { IConsensusDetector } from "./consensus/base.js";
import { ConsensusDetector } from "./consensus/detector.js";
import { GenerativeConsensusCheck, type IConsensusChecker } from "./consensus/llm-check.js";
import { detectDeadlock } from "./consensus/deadlock.js";
import { topicTerms } from "./consensus/text.js";
import { buildTurnPrompt } from "./prompts.js";
import { computeExpertiseWeights } from "./roles.js";
import {
  InsufficientRolesError,
  InvalidSessionIdError,
  MalformedResponseError,
  SessionMismatchError,
  errorMessage,
} from "./errors.js";
import { createLogger, createSessionLog, isValidSessionId, truncate } from "./logger.js";

const log = createLogger("orchestrator");

export type TerminalStatus = Exclude<DiscussionStatus, "running">;

export interface DiscussionOptions {
  topic: string;
  /** Participating roles, in speaking order (at least 2 distinct) */
  roles: RoleConfig[];
  /** Resume (or name) a session. Default: a new random id */
  sessionId?: string;
  maxTurns?: number;
  windowSize?: number;
  threshold?: number;
  checkEvery?: DiscussionConfig["checkEvery"];
  /** Explicit consensus weights per role id; overrides config.weighting */
  roleWeights?: ReadonlyMap<string, number>;
  /** Token budget for the session (0 = unlimited); overrides config */
  maxTokens?: number;
  /** Cooperative cancellation, honoured before each turn */
  signal?: AbortSignal;
}

export interface DiscussionDeps {
  generator: IGenerator;
  store: ICheckpointStore;
  /** undefined = summarize with the generator, null = deterministic digest only */
  summarizer?: ISummarizer | null;
  /** Overrides the detector built from config and options */
  detector?: IConsensusDetector;
  /** Borderline checker; default: the generator when discussion.llmCheck is set */
  checker?: IConsensusChecker | null;
}

export interface DiscussionResult {
  sessionId: string;
  status: TerminalStatus;
  history: Message[];
  summary: string;
  consensusReached: boolean;
  consensusDetail: ConsensusDetail | null;
  /** Total turns in the session, including earlier runs */
  turnsUsed: number;
  /** Turns produced by this run */
  newTurns: number;
  aborted: boolean;
  abortReason?: string;
  /** Token usage of the whole session */
  usage: TokenUsage;
  budgetUsedPercent: number | null;
  durationMs: number;
  state: DiscussionState;
}

export interface EstimateResult {
  remainingTurns: number;
  estimatedTokens: number;
  budgetPercent: number | null;
  overBudget: boolean;
}

const DEFAULTS = ConfigSchema.parse({});

export class DiscussionSession {
  private readonly config: DiscussionConfig;
  private readonly budget: BudgetConfig;

  constructor(
    private readonly deps: DiscussionDeps,
    config?: Partial<DiscussionConfig>,
    budget?: Partial<BudgetConfig>,
  ) {
    this.config = { ...DEFAULTS.discussion, ...config };
    this.budget = { ...DEFAULTS.budget, ...budget };
  }

  /**
   * Estimate token usage of the remaining turns before running.
   * Each turn is one generation call; folding adds roughly one call per message beyond the window.
   */
  estimate(options: { maxTurns?: number; turnsDone?: number; windowSize?: number; maxTokens?: number }): EstimateResult {
    const maxTurns = options.maxTurns ?? this.config.maxTurns;
    const windowSize = options.windowSize ?? this.config.windowSize;
    const remainingTurns = Math.max(0, maxTurns - (options.turnsDone ?? 0));
    const perInvocation = this.budget.estimatedTokensPerInvocation;
    const summaryCalls = this.deps.summarizer === null ? 0 : Math.max(0, maxTurns - windowSize);
    const summaryTokens = Math.round(summaryCalls * perInvocation * 0.5);
    const estimatedTokens = remainingTurns * perInvocation + summaryTokens;

    const maxTokens = options.maxTokens ?? this.budget.maxTokensPerDiscussion;
    const budgetPercent = maxTokens > 0 ? (estimatedTokens / maxTokens) * 100 : null;
    const overBudget = budgetPercent !== null && budgetPercent > this.budget.warnAtPercent;

    log.info("estimate:", estimatedTokens, "tokens,", remainingTurns, "turns" +
      (budgetPercent !== null ? `, ${budgetPercent.toFixed(1)}% of budget` : ""));
    return { remainingTurns, estimatedTokens, budgetPercent, overBudget };
  }

  async run(options: DiscussionOptions): Promise<DiscussionResult> {
    const start = Date.now();

    // --- INIT ---
    const roles = uniqueRoles(options.roles);
    if (roles.length < 2) {
      throw new InsufficientRolesError(roles.length);
    }
    const sessionId = options.sessionId ?? randomUUID();
    if (!isValidSessionId(sessionId)) {
      throw new InvalidSessionIdError(sessionId);
    }

    const maxTurns = options.maxTurns ?? this.config.maxTurns;
    const windowSize = options.windowSize ?? this.config.windowSize;
    const threshold = options.threshold ?? this.config.threshold;
    const checkEvery = options.checkEvery ?? this.config.checkEvery;
    const maxTokens = options.maxTokens ?? this.budget.maxTokensPerDiscussion;
    const roleIds = roles.map((r) => r.id);
    const roleNames = new Map(roles.map((r) => [r.id, r.name]));

    let state = await this.deps.store.load(sessionId, options.topic);
    if (state.topic !== options.topic) {
      throw new SessionMismatchError(sessionId, state.topic, options.topic);
    }
    if (state.roleIds.length === 0) {
      state = { ...state, roleIds };
    } else if (state.roleIds.join(",") !== roleIds.join(",")) {
      log.warn(`session ${sessionId} was started with roles [${state.roleIds.join(", ")}], ` +
        `continuing with [${roleIds.join(", ")}]`);
    }

    const slog = createSessionLog(sessionId);
    slog?.write("info", `session ${sessionId} | topic: ${options.topic}`);
    slog?.write("info", `roles: ${roleIds.join(", ")} | maxTurns: ${maxTurns} | window: ${windowSize} | threshold: ${threshold}`);
    log.info("discussion start:", roles.length, "roles, maxTurns=" + maxTurns,
      state.turn > 0 ? `resuming ${sessionId} at turn ${state.turn}` : `session ${sessionId}`);

    const startTurn = state.turn;
    const finish = (status: TerminalStatus, abortReason?: string): DiscussionResult => {
      const durationMs = Date.now() - start;
      log.info("discussion end:", status, "|", state.turn - startTurn, "new turns,",
        totalTokens(state.usage), "tokens,", durationMs + "ms");
      slog?.write("info", `end: ${status}${abortReason ? ` (${abortReason})` : ""} at turn ${state.turn}`);
      return {
        sessionId,
        status,
        history: state.history,
        summary: state.summary,
        consensusReached: state.consensusReached,
        consensusDetail: state.consensusDetail,
        turnsUsed: state.turn,
        newTurns: state.turn - startTurn,
        aborted: status === "aborted",
        abortReason,
        usage: state.usage,
        budgetUsedPercent: maxTokens > 0 ? (totalTokens(state.usage) / maxTokens) * 100 : null,
        durationMs,
        state,
      };
    };

    // Idempotent resume of a finished session: no generation, no writes
    if (state.consensusReached) {
      log.info(`session ${sessionId} already reached consensus`);
      return finish("consensus");
    }
    if (state.turn >= maxTurns) {
      if (state.status !== "exhausted") {
        state = { ...state, status: "exhausted" };
        await this.deps.store.save(sessionId, state);
      }
      return finish("exhausted");
    }

    const compressor = new ContextCompressor(
      this.deps.summarizer === undefined
        ? new GenerativeSummarizer(this.deps.generator, {
            maxOutputTokens: this.config.summaryMaxTokens,
            roleNames,
          })
        : this.deps.summarizer,
      { fallbackCharsPerMessage: this.config.fallbackCharsPerMessage, sessionLog: slog },
    );

    const checker = this.deps.checker !== undefined
      ? this.deps.checker
      : this.config.llmCheck
        ? new GenerativeConsensusCheck(this.deps.generator, { roleNames })
        : null;
    const detector = this.deps.detector ?? new ConsensusDetector({
      threshold,
      similarityThreshold: this.config.similarityThreshold,
      maxPointsPerMessage: this.config.maxPointsPerMessage,
      stabilityWindow: this.config.stabilityWindow,
      llmBand: this.config.llmBand,
    }, checker);

    const roleWeights = options.roleWeights
      ?? (this.config.weighting === "expertise" ? computeExpertiseWeights(roles, options.topic) : undefined);
    const excludeTerms = topicTerms(options.topic);

    const latest = state.observations[state.observations.length - 1];
    let reading: { ratio: number; agreedPoint?: string } | undefined = latest
      ? { ratio: latest.ratio }
      : undefined;
    let budgetWarned = false;

    // --- RUNNING ---
    for (;;) {
      if (options.signal?.aborted) {
        log.warn(`session ${sessionId}: cancelled at turn ${state.turn}`);
        return finish("aborted", "cancelled");
      }

      if (state.turn >= maxTurns) {
        state = { ...state, status: "exhausted" };
        await this.deps.store.save(sessionId, state);
        return finish("exhausted");
      }

      if (maxTokens > 0) {
        const usedPercent = (totalTokens(state.usage) / maxTokens) * 100;
        if (usedPercent >= 100) {
          log.warn(`session ${sessionId}: token budget exhausted (${totalTokens(state.usage)}/${maxTokens}). Stopping.`);
          state = { ...state, status: "exhausted" };
          await this.deps.store.save(sessionId, state);
          return finish("exhausted", "token budget exhausted");
        }
        if (usedPercent >= this.budget.warnAtPercent && !budgetWarned) {
          budgetWarned = true;
          log.warn(`session ${sessionId}: budget warning (${usedPercent.toFixed(0)}% used)`);
        }
      }

      const role = roles[state.turn % roles.length];
      const turnNumber = state.turn + 1;
      const prompt = buildTurnPrompt({
        role,
        topic: options.topic,
        summary: state.summary,
        recent: state.history,
        turnNumber,
        maxTurns,
        roleNames,
        contextTokenBudget: this.config.contextTokenBudget,
        consensus: reading,
        deadlockNote: state.deadlock !== null,
      });
      log.debug(`turn ${turnNumber}: ${role.id}, prompt ${prompt.length} chars`);
      slog?.write("debug", `--- turn ${turnNumber} ${role.id} prompt ---\n${prompt}`);

      let text: string;
      let usage: TokenUsage;
      try {
        const result = await this.deps.generator.generate(prompt, {
          maxOutputTokens: this.config.maxOutputTokens,
          temperature: this.config.temperature,
        });
        text = result.text.trim();
        if (!text) throw new MalformedResponseError(`${this.deps.generator.name}: empty reply`);
        usage = result.usage ?? { inputTokens: estimateTokens(prompt), outputTokens: estimateTokens(text) };
        slog?.write("debug", `--- turn ${turnNumber} ${role.id} reply (${result.durationMs}ms) ---\n${text}`);
      } catch (err) {
        const reason = errorMessage(err);
        log.error(`turn ${turnNumber} (${role.id}) failed:`, reason);
        slog?.write("error", `turn ${turnNumber} (${role.id}) failed: ${reason}`);
        return finish("aborted", reason);
      }

      state = appendMessage(state, role.id, text);
      state = { ...state, usage: addUsage(state.usage, usage) };
      state = await compressor.compress(state, windowSize);

      const boundary = checkEvery === "turn" || state.turn % roles.length === 0;
      if (boundary) {
        state = await this.check(state, detector, roleWeights, excludeTerms, slog);
        const last = state.observations[state.observations.length - 1];
        reading = state.consensusDetail
          ? { ratio: state.consensusDetail.ratio, agreedPoint: state.consensusDetail.agreedPoint }
          : last && last.turn === state.turn ? { ratio: last.ratio } : reading;
      }

      log.info(`turn ${state.turn}/${maxTurns} ${role.id}: ${truncate(text, 120)}`);
      await this.deps.store.save(sessionId, state);

      if (state.consensusReached) {
        return finish("consensus");
      }
    }
  }

  private async check(
    state: DiscussionState,
    detector: IConsensusDetector,
    roleWeights: ReadonlyMap<string, number> | undefined,
    excludeTerms: ReadonlySet<string>,
    slog: ReturnType<typeof createSessionLog>,
  ): Promise<DiscussionState> {
    const decision = await detector.detect({
      window: state.history,
      topic: state.topic,
      roleWeights,
      previous: state.observations,
    });
    let next = decision.observation ? pushObservation(state, decision.observation) : state;
    slog?.write("info", `consensus check at turn ${state.turn}: ratio ${decision.ratio.toFixed(2)}, ` +
      `confidence ${decision.confidence.toFixed(2)}, reached ${decision.reached}`);

    if (decision.reached) {
      log.info(`consensus at turn ${state.turn}: ratio ${decision.ratio.toFixed(2)}, supporters ${decision.supporters.join(", ")}`);
      return {
        ...next,
        consensusReached: true,
        consensusDetail: {
          agreedPoint: decision.agreedPoint ?? "",
          confidence: decision.confidence,
          ratio: decision.ratio,
          supporters: decision.supporters,
          turn: state.turn,
        },
        deadlock: null,
        status: "consensus",
      };
    }

    const deadlock = detectDeadlock(state.history, this.config.deadlockThreshold, excludeTerms);
    if (deadlock.deadlocked) {
      const count = (next.deadlock?.count ?? 0) + 1;
      log.warn(`deadlock detected at turn ${state.turn} (${count} check(s) in a row)`);
      slog?.write("warn", `deadlock detected at turn ${state.turn}`);
      next = { ...next, deadlock: { detectedAtTurn: state.turn, count } };
    } else if (next.deadlock) {
      next = { ...next, deadlock: null };
    }
    return next;
  }
}

/** Drop repeated role ids, keeping the first occurrence. */
function uniqueRoles(roles: RoleConfig[]): RoleConfig[] {
  const seen = new Set<string>();
  return roles.filter((r) => {
    if (seen.has(r.id)) return false;
    seen.add(r.id);
    return true;
  });
}

