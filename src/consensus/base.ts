/**
 * Consensus detection interfaces.
 *
 * The detector reads the current message window and decides whether the
 * participating roles agree on a common point. Structural analysis is
 * synchronous and deterministic; a generative check may adjust borderline
 * decisions.
 */

import type { Message, Observation } from "../discussion/state.js";

export type Polarity = -1 | 0 | 1;

export interface KeyPoint {
  roleId: string;
  turnIndex: number;
  text: string;
  terms: ReadonlySet<string>;
  polarity: Polarity;
}

export interface ConsensusInput {
  /** Messages currently in the window, oldest first */
  window: Message[];
  topic: string;
  /** Role id → weight (default 1.0) */
  roleWeights?: ReadonlyMap<string, number>;
  /** Observations from previous checks, oldest first */
  previous?: Observation[];
}

export interface ConsensusSignals {
  /** Mean stance of each role's latest message, in [-1, 1] */
  sentiment: number;
  /** Share of recent observations matching the current dominant point, in [0, 1] */
  stability: number;
  /** Verdict of the generative check, when consulted */
  llm?: boolean;
}

export interface ConsensusAnalysis {
  ratio: number;
  /** Latest supporting statement of the dominant point */
  agreedPoint?: string;
  supporters: string[];
  dissenters: string[];
  distinctRoles: number;
  /** Confidence before any generative adjustment */
  confidence: number;
  signals: ConsensusSignals;
  /** Snapshot to store for the stability signal; null when no point was found */
  observation: Observation | null;
}

export interface ConsensusDecision extends ConsensusAnalysis {
  reached: boolean;
}

export interface IConsensusDetector {
  detect(input: ConsensusInput): Promise<ConsensusDecision>;
}

/** Widest distance from the threshold at which a generative check may decide. */
export const MAX_LLM_BAND = 0.15;

export function clamp01(x: number): number {
  return Math.min(1, Math.max(0, x));
}
