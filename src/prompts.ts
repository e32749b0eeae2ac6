/**
 * Prompt construction for turns, summaries and the consensus check.
 *
 * Turn prompts bound the verbatim context to an approximate token budget:
 * the newest messages are kept, older ones are left to the summary.
 */

import type { Message } from "./discussion/state.js";
import type { RoleConfig } from "./config.js";
import { buildRoleDescription } from "./roles.js";
import { estimateTokens } from "./adapters/base.js";

export interface TurnPromptInput {
  role: RoleConfig;
  topic: string;
  summary: string;
  recent: Message[];
  /** 1-based number of the turn being generated */
  turnNumber: number;
  maxTurns: number;
  /** Display names keyed by role id */
  roleNames: ReadonlyMap<string, string>;
  contextTokenBudget: number;
  /** Latest consensus reading, when a check has run */
  consensus?: { ratio: number; agreedPoint?: string };
  /** Set when the discussion was detected going in circles */
  deadlockNote?: boolean;
}

export function formatMessage(m: Message, roleNames: ReadonlyMap<string, string>): string {
  return `[${roleNames.get(m.roleId) ?? m.roleId}] ${m.content}`;
}

/** Newest messages whose combined estimate fits the budget (at least the last one). */
export function fitToBudget(
  messages: Message[],
  roleNames: ReadonlyMap<string, string>,
  budget: number,
): Message[] {
  const kept: Message[] = [];
  let used = 0;
  for (let i = messages.length - 1; i >= 0; i--) {
    const cost = estimateTokens(formatMessage(messages[i], roleNames));
    if (kept.length > 0 && used + cost > budget) break;
    kept.unshift(messages[i]);
    used += cost;
  }
  return kept;
}

export function buildTurnPrompt(input: TurnPromptInput): string {
  const parts: string[] = [];
  parts.push(buildRoleDescription(input.role));
  parts.push(`Discussion topic: ${input.topic}`);
  parts.push(`Turn ${input.turnNumber} of ${input.maxTurns}.`);

  if (input.summary) {
    parts.push(`Summary of the discussion so far:\n${input.summary}`);
  }

  const recent = fitToBudget(input.recent, input.roleNames, input.contextTokenBudget);
  if (recent.length > 0) {
    parts.push(`Recent messages:\n${recent.map((m) => formatMessage(m, input.roleNames)).join("\n\n")}`);
  } else {
    parts.push("You are opening the discussion.");
  }

  if (input.consensus) {
    const pct = Math.round(input.consensus.ratio * 100);
    parts.push(
      `Current agreement: ${pct}% of participants` +
      (input.consensus.agreedPoint ? ` support "${input.consensus.agreedPoint}".` : ".")
    );
  }

  if (input.deadlockNote) {
    parts.push(
      "Moderator note: the discussion is repeating itself. Do not restate your previous position; " +
      "propose a concrete compromise or name the specific condition under which you would agree."
    );
  }

  parts.push(
    `Respond as the ${input.role.name} in a few sentences. Engage with the points above, ` +
    "say clearly whether you agree or disagree, and work toward a conclusion the group can share."
  );

  return parts.join("\n\n");
}

export function buildSummaryPrompt(
  topic: string,
  previousSummary: string,
  folded: Message[],
  roleNames: ReadonlyMap<string, string>,
): string {
  return [
    `You maintain the running summary of a discussion about: ${topic}`,
    previousSummary ? `Current summary:\n${previousSummary}` : "There is no summary yet.",
    `Messages to add to the summary:\n${folded.map((m) => formatMessage(m, roleNames)).join("\n")}`,
    "Write the updated summary. Keep every participant's position and any points of agreement. " +
    "Reply with the summary only.",
  ].join("\n\n");
}

export function buildConsensusCheckPrompt(
  topic: string,
  messages: Message[],
  roleNames: ReadonlyMap<string, string>,
): string {
  return [
    `Topic: ${topic}`,
    `Recent messages:\n${messages.map((m) => formatMessage(m, roleNames)).join("\n\n")}`,
    "Have the participants reached consensus on the topic? " +
    "Answer on the first line with exactly CONSENSUS: YES or CONSENSUS: NO, then explain briefly.",
  ].join("\n\n");
}

/** Parse a "CONSENSUS: YES|NO" verdict; null when absent. */
export function parseConsensusVerdict(text: string): boolean | null {
  const match = /CONSENSUS:\s*(YES|NO)\b/i.exec(text);
  if (!match) return null;
  return match[1].toUpperCase() === "YES";
}
