/**
 * Tool handlers shared by the MCP server.
 * Each handler takes validated tool input and returns the text shown to the client.
 */

import type { Config, RoleConfig } from "./config.js";
import type { IGenerator } from "./adapters/base.js";
import type { ICheckpointStore } from "./store/interfaces.js";
import type { DiscussInput } from "./tools.js";
import { DiscussionSession, type DiscussionResult } from "./orchestrator.js";
import { listRoles, resolveRoles, selectRolesForTopic } from "./roles.js";
import { createLogger } from "./logger.js";

const log = createLogger("handlers");

export interface HandlerContext {
  config: Config;
  generator: IGenerator;
  store: ICheckpointStore;
}

export function pickRoles(ctx: HandlerContext, topic: string, ids: string[] | undefined, count: number): RoleConfig[] {
  return ids && ids.length > 0
    ? resolveRoles(ids, ctx.config)
    : selectRolesForTopic(topic, count, ctx.config);
}

export function formatResult(result: DiscussionResult, roleNames: ReadonlyMap<string, string>): string {
  const lines: string[] = [];
  if (result.consensusReached && result.consensusDetail) {
    const d = result.consensusDetail;
    lines.push(`**Consensus** (ratio: ${d.ratio.toFixed(2)}, confidence: ${d.confidence.toFixed(2)}, turn ${d.turn})`);
    lines.push("", d.agreedPoint);
    lines.push("", `Supporters: ${d.supporters.map((id) => roleNames.get(id) ?? id).join(", ")}`);
  } else if (result.aborted) {
    lines.push(`**Aborted** after ${result.turnsUsed} turns: ${result.abortReason ?? "unknown reason"}`);
  } else {
    lines.push(`**No consensus** after ${result.turnsUsed} turns.`);
  }

  if (result.summary) {
    lines.push("", "--- Summary of earlier turns ---", result.summary);
  }
  lines.push("", "--- Recent messages ---");
  for (const m of result.history) {
    lines.push(`[${m.turnIndex}] ${roleNames.get(m.roleId) ?? m.roleId}: ${m.content}`);
  }

  const tokens = result.usage.inputTokens + result.usage.outputTokens;
  lines.push(
    "",
    `---\nSession ${result.sessionId} | ${result.status} | ${result.newTurns} new turns | ` +
    `${(result.durationMs / 1000).toFixed(1)}s | Tokens: ${tokens}`
  );
  return lines.join("\n");
}

export async function handleDiscuss(ctx: HandlerContext, args: DiscussInput): Promise<string> {
  log.debug("discuss tool invoked:", JSON.stringify(args));
  const roles = pickRoles(ctx, args.topic, args.roles, args.num_roles);
  const session = new DiscussionSession(
    { generator: ctx.generator, store: ctx.store },
    ctx.config.discussion,
    ctx.config.budget,
  );

  if (args.estimate_only) {
    const existing = args.session_id ? await ctx.store.read(args.session_id) : null;
    const estimate = session.estimate({
      maxTurns: args.max_turns,
      turnsDone: existing?.turn ?? 0,
      windowSize: args.window_size,
      maxTokens: args.max_tokens,
    });
    log.info("estimate_only result:", JSON.stringify(estimate));
    return JSON.stringify(estimate, null, 2);
  }

  const result = await session.run({
    topic: args.topic,
    roles,
    sessionId: args.session_id,
    maxTurns: args.max_turns,
    windowSize: args.window_size,
    threshold: args.threshold,
    maxTokens: args.max_tokens,
  });
  return formatResult(result, new Map(roles.map((r) => [r.id, r.name])));
}

export function handleListRoles(ctx: HandlerContext): string {
  const roles = listRoles(ctx.config).map((r) => ({
    id: r.id,
    name: r.name,
    description: r.description,
    expertise: r.expertise,
  }));
  return JSON.stringify(roles, null, 2);
}

export async function handleStatus(ctx: HandlerContext, sessionId?: string): Promise<string> {
  if (!sessionId) {
    const sessions = await ctx.store.list();
    if (sessions.length === 0) return "No stored sessions.";
    return sessions
      .map((s) => `${s.sessionId}  ${s.status.padEnd(9)}  turn ${s.turn}  ${s.topic}`)
      .join("\n");
  }

  const state = await ctx.store.read(sessionId);
  if (!state) return `Session ${sessionId}: not found or unreadable.`;
  return JSON.stringify({
    sessionId,
    topic: state.topic,
    status: state.status,
    turn: state.turn,
    roles: state.roleIds,
    messagesInWindow: state.history.length,
    foldedMessages: state.foldedCount,
    consensusReached: state.consensusReached,
    consensusDetail: state.consensusDetail,
    deadlock: state.deadlock,
    usage: state.usage,
    updatedAt: state.updatedAt,
  }, null, 2);
}
