import type { Message, Observation } from "../discussion/state.js";
import { dice, stanceScore } from "./text.js";

/** Mean stance of each role's latest message in the window, in [-1, 1]. */
export function sentimentSignal(window: Message[]): number {
  const latest = new Map<string, Message>();
  for (const m of window) latest.set(m.roleId, m);
  if (latest.size === 0) return 0;
  let sum = 0;
  for (const m of latest.values()) sum += stanceScore(m.content);
  return sum / latest.size;
}

function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const set = new Set(a);
  return b.every((x) => set.has(x));
}

/**
 * Temporal stability: the share of the last `window` observations whose
 * dominant point resembles the current one and has the same supporters.
 * Missing history counts as no match, so the signal builds up over checks.
 */
export function stabilitySignal(
  current: Observation | null,
  previous: readonly Observation[],
  window: number,
  similarityThreshold: number,
): number {
  if (!current || window <= 0) return 0;
  const terms = new Set(current.terms);
  const recent = previous.slice(-window);
  const matches = recent.filter(
    (o) => dice(new Set(o.terms), terms) >= similarityThreshold && sameMembers(o.supporters, current.supporters)
  ).length;
  return matches / window;
}
