/**
 * Discussion data model.
 *
 * A DiscussionState is the unit of persistence: one per session id.
 * Invariant after every append/compress: turn === foldedCount + history.length.
 */

import { emptyUsage, type TokenUsage } from "../adapters/base.js";

export interface Message {
  readonly roleId: string;
  readonly content: string;
  /** 1-based: the n-th message produced in the session has turnIndex n */
  readonly turnIndex: number;
  /** ISO-8601 */
  readonly timestamp: string;
}

export type DiscussionStatus = "running" | "consensus" | "exhausted" | "aborted";

export interface ConsensusDetail {
  agreedPoint: string;
  confidence: number;
  ratio: number;
  supporters: string[];
  /** Turn at which consensus was detected */
  turn: number;
}

/** Dominant-cluster snapshot recorded at each consensus check. */
export interface Observation {
  turn: number;
  terms: string[];
  supporters: string[];
  ratio: number;
}

export interface DeadlockInfo {
  detectedAtTurn: number;
  /** How many checks in a row found the discussion going in circles */
  count: number;
}

export interface DiscussionState {
  readonly topic: string;
  history: Message[];
  summary: string;
  foldedCount: number;
  turn: number;
  consensusReached: boolean;
  consensusDetail: ConsensusDetail | null;
  observations: Observation[];
  deadlock: DeadlockInfo | null;
  usage: TokenUsage;
  roleIds: string[];
  status: DiscussionStatus;
  createdAt: string;
  updatedAt: string;
}

/** Observations kept for the temporal-stability signal. */
export const MAX_OBSERVATIONS = 10;

export function createState(topic: string, roleIds: string[] = []): DiscussionState {
  const now = new Date().toISOString();
  return {
    topic,
    history: [],
    summary: "",
    foldedCount: 0,
    turn: 0,
    consensusReached: false,
    consensusDetail: null,
    observations: [],
    deadlock: null,
    usage: emptyUsage(),
    roleIds: [...roleIds],
    status: "running",
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Append the next message. Returns a new state; the input is not modified.
 * Throws if consensus was already reached: the conversation is closed.
 */
export function appendMessage(
  state: DiscussionState,
  roleId: string,
  content: string,
  now: Date = new Date(),
): DiscussionState {
  if (state.consensusReached) {
    throw new Error("Cannot append to a discussion that has reached consensus.");
  }
  const message: Message = {
    roleId,
    content,
    turnIndex: state.turn + 1,
    timestamp: now.toISOString(),
  };
  return {
    ...state,
    history: [...state.history, message],
    turn: state.turn + 1,
    updatedAt: message.timestamp,
  };
}

/** Record a new observation, keeping only the most recent ones. */
export function pushObservation(state: DiscussionState, observation: Observation): DiscussionState {
  return {
    ...state,
    observations: [...state.observations, observation].slice(-MAX_OBSERVATIONS),
  };
}

/** Check the structural invariants; returns a reason string when broken. */
export function checkInvariants(state: DiscussionState): string | null {
  if (state.turn !== state.foldedCount + state.history.length) {
    return `turn ${state.turn} != folded ${state.foldedCount} + history ${state.history.length}`;
  }
  for (let i = 1; i < state.history.length; i++) {
    if (state.history[i].turnIndex <= state.history[i - 1].turnIndex) {
      return `history out of order at position ${i}`;
    }
  }
  const last = state.history[state.history.length - 1];
  if (last && last.turnIndex !== state.turn) {
    return `last message turn ${last.turnIndex} != turn ${state.turn}`;
  }
  return null;
}
