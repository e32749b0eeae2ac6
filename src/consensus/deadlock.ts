import type { Message } from "../discussion/state.js";
import { contentTerms, dice } from "./text.js";

export interface DeadlockResult {
  deadlocked: boolean;
  /** Similarity of each compared role's last two messages */
  similarities: Map<string, number>;
}

/**
 * A discussion is deadlocked when every role with at least two messages in
 * the window repeats itself (last two messages at or above the threshold),
 * and at least two roles were compared.
 */
export function detectDeadlock(
  window: Message[],
  threshold: number,
  exclude: ReadonlySet<string> = new Set(),
): DeadlockResult {
  const byRole = new Map<string, Message[]>();
  for (const m of window) {
    const list = byRole.get(m.roleId) ?? [];
    list.push(m);
    byRole.set(m.roleId, list);
  }

  const similarities = new Map<string, number>();
  for (const [roleId, messages] of byRole) {
    if (messages.length < 2) continue;
    const [prev, last] = messages.slice(-2);
    similarities.set(roleId, dice(contentTerms(prev.content, exclude), contentTerms(last.content, exclude)));
  }

  const deadlocked = similarities.size >= 2 && [...similarities.values()].every((s) => s >= threshold);
  return { deadlocked, similarities };
}
