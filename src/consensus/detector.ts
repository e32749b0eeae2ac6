import type {
  ConsensusAnalysis,
  ConsensusDecision,
  ConsensusInput,
  IConsensusDetector,
} from "./base.js";
import { clamp01, MAX_LLM_BAND } from "./base.js";
import type { IConsensusChecker } from "./llm-check.js";
import { extractKeyPoints } from "./key-points.js";
import { clusterPoints, supportersOf, type PointCluster } from "./clusters.js";
import { sentimentSignal, stabilitySignal } from "./signals.js";
import { topicTerms } from "./text.js";
import { createLogger } from "../logger.js";

const log = createLogger("consensus");

export interface DetectorOptions {
  threshold: number;
  similarityThreshold: number;
  maxPointsPerMessage: number;
  stabilityWindow: number;
  /** Distance from the threshold within which the checker is consulted */
  llmBand: number;
}

export const DEFAULT_DETECTOR_OPTIONS: DetectorOptions = {
  threshold: 0.7,
  similarityThreshold: 0.3,
  maxPointsPerMessage: 3,
  stabilityWindow: 2,
  llmBand: 0.1,
};

const RATIO_WEIGHT = 0.8;
const SIGNAL_WEIGHT = 0.1;
const LLM_ADJUSTMENT = 0.1;

interface Dominant {
  cluster: PointCluster;
  supporters: string[];
  weight: number;
  latestTurn: number;
}

/**
 * Multi-signal consensus detector.
 *
 * 1. Key points are extracted from each message in the window.
 * 2. Similar points are clustered; each cluster tracks every role's latest stance.
 * 3. The dominant cluster is the one with the largest supporter weight; its
 *    agreement ratio is supporter weight over the weight of all distinct
 *    roles in the window.
 * 4. Sentiment and temporal stability adjust confidence by at most ±0.1 each.
 * 5. Fewer than two distinct roles never reach consensus.
 * 6. An optional checker is consulted only when the ratio is within llmBand
 *    of the threshold; it can move the decision only inside that band. The
 *    band is capped at MAX_LLM_BAND so a low ratio is never overturned.
 */
export class ConsensusDetector implements IConsensusDetector {
  private readonly options: DetectorOptions;

  constructor(
    options: Partial<DetectorOptions> = {},
    private readonly checker: IConsensusChecker | null = null,
  ) {
    const merged = { ...DEFAULT_DETECTOR_OPTIONS, ...options };
    this.options = { ...merged, llmBand: Math.min(Math.max(merged.llmBand, 0), MAX_LLM_BAND) };
  }

  analyze(input: ConsensusInput): ConsensusAnalysis {
    const { window, roleWeights } = input;
    const exclude = topicTerms(input.topic);

    const roles: string[] = [];
    for (const m of window) if (!roles.includes(m.roleId)) roles.push(m.roleId);

    const weightOf = (roleId: string) => Math.max(0, roleWeights?.get(roleId) ?? 1);
    let totalWeight = roles.reduce((sum, r) => sum + weightOf(r), 0);
    const useCounts = totalWeight <= 0;
    if (useCounts) totalWeight = roles.length;
    const effectiveWeight = (roleId: string) => (useCounts ? 1 : weightOf(roleId));

    const points = window.flatMap((m) => extractKeyPoints(m, this.options.maxPointsPerMessage, exclude));
    const clusters = clusterPoints(points, this.options.similarityThreshold);

    let dominant: Dominant | null = null;
    for (const cluster of clusters) {
      const supporters = supportersOf(cluster);
      if (supporters.length === 0) continue;
      const weight = supporters.reduce((sum, r) => sum + effectiveWeight(r), 0);
      const latestTurn = Math.max(...supporters.map((r) => cluster.stances.get(r)?.turnIndex ?? 0));
      if (
        !dominant ||
        weight > dominant.weight ||
        (weight === dominant.weight && latestTurn > dominant.latestTurn)
      ) {
        dominant = { cluster, supporters, weight, latestTurn };
      }
    }

    const ratio = dominant && totalWeight > 0 ? clamp01(dominant.weight / totalWeight) : 0;
    const supporters = dominant?.supporters ?? [];
    const dissenters = roles.filter((r) => !supporters.includes(r));

    let agreedPoint: string | undefined;
    if (dominant) {
      for (const r of dominant.supporters) {
        const stance = dominant.cluster.stances.get(r);
        if (stance && stance.turnIndex === dominant.latestTurn) agreedPoint = stance.text;
      }
    }

    const observation = dominant
      ? {
          turn: window.length > 0 ? window[window.length - 1].turnIndex : 0,
          terms: [...dominant.cluster.terms].sort(),
          supporters: [...supporters].sort(),
          ratio,
        }
      : null;

    const sentiment = sentimentSignal(window);
    const stability = stabilitySignal(
      observation,
      input.previous ?? [],
      this.options.stabilityWindow,
      this.options.similarityThreshold,
    );
    const confidence = clamp01(RATIO_WEIGHT * ratio + SIGNAL_WEIGHT * sentiment + SIGNAL_WEIGHT * stability);

    return {
      ratio,
      agreedPoint,
      supporters,
      dissenters,
      distinctRoles: roles.length,
      confidence,
      signals: { sentiment, stability },
      observation,
    };
  }

  async detect(input: ConsensusInput): Promise<ConsensusDecision> {
    const analysis = this.analyze(input);
    const { threshold, llmBand } = this.options;

    if (analysis.distinctRoles < 2) {
      log.debug("fewer than 2 distinct roles in window, no consensus possible");
      return { ...analysis, reached: false };
    }

    let reached = analysis.ratio >= threshold;
    let confidence = analysis.confidence;
    const signals = { ...analysis.signals };

    if (this.checker && Math.abs(analysis.ratio - threshold) <= llmBand) {
      const verdict = await this.checker.check(input.topic, input.window);
      if (verdict !== null) {
        signals.llm = verdict;
        reached = verdict;
        confidence = clamp01(confidence + (verdict ? LLM_ADJUSTMENT : -LLM_ADJUSTMENT));
        log.info(`borderline ratio ${analysis.ratio.toFixed(2)}: checker says ${verdict ? "YES" : "NO"}`);
      }
    }

    log.debug(
      `ratio=${analysis.ratio.toFixed(2)} threshold=${threshold} reached=${reached}`,
      `supporters=${analysis.supporters.join(",")} confidence=${confidence.toFixed(2)}`,
    );
    return { ...analysis, reached, confidence, signals };
  }
}
