/**
 * Checkpoint document format (JSON, snake_case on disk).
 *
 * Required: topic, history, summary, turn, consensus_reached.
 * Everything else is optional and defaulted; unknown fields are ignored.
 */

import { z } from "zod";
import {
  checkInvariants,
  type DiscussionState,
  MAX_OBSERVATIONS,
} from "../discussion/state.js";

export const CHECKPOINT_VERSION = 1;

const MessageRecordSchema = z.object({
  role_id: z.string().min(1),
  content: z.string(),
  turn_index: z.number().int().min(1),
  timestamp: z.string(),
});

const ConsensusDetailRecordSchema = z.object({
  agreed_point: z.string(),
  confidence: z.number().min(0).max(1),
  ratio: z.number().min(0).max(1),
  supporters: z.array(z.string()).default([]),
  turn: z.number().int().min(0),
});

const ObservationRecordSchema = z.object({
  turn: z.number().int().min(0),
  terms: z.array(z.string()),
  supporters: z.array(z.string()),
  ratio: z.number(),
});

export const CheckpointSchema = z.object({
  version: z.number().int().default(CHECKPOINT_VERSION),
  session_id: z.string().optional(),
  topic: z.string(),
  role_ids: z.array(z.string()).default([]),
  history: z.array(MessageRecordSchema),
  summary: z.string(),
  folded_count: z.number().int().min(0).default(0),
  turn: z.number().int().min(0),
  consensus_reached: z.boolean(),
  consensus_detail: ConsensusDetailRecordSchema.nullable().default(null),
  observations: z.array(ObservationRecordSchema).default([]),
  deadlock: z.object({
    detected_at_turn: z.number().int().min(0),
    count: z.number().int().min(1),
  }).nullable().default(null),
  usage: z.object({
    input_tokens: z.number().min(0).default(0),
    output_tokens: z.number().min(0).default(0),
  }).default({}),
  status: z.enum(["running", "consensus", "exhausted", "aborted"]).optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type CheckpointDocument = z.infer<typeof CheckpointSchema>;

export function toCheckpoint(sessionId: string, state: DiscussionState): CheckpointDocument {
  return {
    version: CHECKPOINT_VERSION,
    session_id: sessionId,
    topic: state.topic,
    role_ids: state.roleIds,
    history: state.history.map((m) => ({
      role_id: m.roleId,
      content: m.content,
      turn_index: m.turnIndex,
      timestamp: m.timestamp,
    })),
    summary: state.summary,
    folded_count: state.foldedCount,
    turn: state.turn,
    consensus_reached: state.consensusReached,
    consensus_detail: state.consensusDetail
      ? {
          agreed_point: state.consensusDetail.agreedPoint,
          confidence: state.consensusDetail.confidence,
          ratio: state.consensusDetail.ratio,
          supporters: state.consensusDetail.supporters,
          turn: state.consensusDetail.turn,
        }
      : null,
    observations: state.observations,
    deadlock: state.deadlock
      ? { detected_at_turn: state.deadlock.detectedAtTurn, count: state.deadlock.count }
      : null,
    usage: { input_tokens: state.usage.inputTokens, output_tokens: state.usage.outputTokens },
    status: state.status,
    created_at: state.createdAt,
    updated_at: state.updatedAt,
  };
}

export type ParseResult =
  | { ok: true; state: DiscussionState }
  | { ok: false; reason: string };

/**
 * Parse and validate a checkpoint. Older documents written without
 * folded_count are accepted when turn equals the history length.
 */
export function parseCheckpoint(raw: unknown): ParseResult {
  const result = CheckpointSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    return { ok: false, reason: issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid document" };
  }
  const doc = result.data;

  const now = new Date().toISOString();
  const consensusReached = doc.consensus_reached;
  const state: DiscussionState = {
    topic: doc.topic,
    history: doc.history.map((m) => ({
      roleId: m.role_id,
      content: m.content,
      turnIndex: m.turn_index,
      timestamp: m.timestamp,
    })),
    summary: doc.summary,
    foldedCount: doc.folded_count,
    turn: doc.turn,
    consensusReached,
    consensusDetail: doc.consensus_detail
      ? {
          agreedPoint: doc.consensus_detail.agreed_point,
          confidence: doc.consensus_detail.confidence,
          ratio: doc.consensus_detail.ratio,
          supporters: doc.consensus_detail.supporters,
          turn: doc.consensus_detail.turn,
        }
      : null,
    observations: doc.observations.slice(-MAX_OBSERVATIONS),
    deadlock: doc.deadlock
      ? { detectedAtTurn: doc.deadlock.detected_at_turn, count: doc.deadlock.count }
      : null,
    usage: { inputTokens: doc.usage.input_tokens, outputTokens: doc.usage.output_tokens },
    roleIds: doc.role_ids,
    status: doc.status ?? (consensusReached ? "consensus" : "running"),
    createdAt: doc.created_at ?? now,
    updatedAt: doc.updated_at ?? now,
  };

  const broken = checkInvariants(state);
  if (broken) return { ok: false, reason: broken };
  return { ok: true, state };
}
