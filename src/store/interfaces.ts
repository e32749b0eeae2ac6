/**
 * Checkpoint store interface.
 *
 * One store owns one directory (or other backing medium). Each session id
 * maps to exactly one checkpoint. A single orchestrator writes a given
 * session; there is no locking.
 */

import type { DiscussionState } from "../discussion/state.js";

export interface CheckpointSummary {
  sessionId: string;
  topic: string;
  turn: number;
  status: DiscussionState["status"];
  consensusReached: boolean;
  updatedAt: string;
}

export interface ICheckpointStore {
  /**
   * Load the session's state. Missing, unreadable or invalid checkpoints
   * yield a fresh state for `topic`; corruption never propagates.
   */
  load(sessionId: string, topic: string): Promise<DiscussionState>;

  /** Persist the state, replacing the previous checkpoint atomically. */
  save(sessionId: string, state: DiscussionState): Promise<void>;

  exists(sessionId: string): Promise<boolean>;

  /** Read a checkpoint without falling back; null when missing or corrupt. */
  read(sessionId: string): Promise<DiscussionState | null>;

  /** Summaries of all readable checkpoints, most recently updated first. */
  list(): Promise<CheckpointSummary[]>;
}
