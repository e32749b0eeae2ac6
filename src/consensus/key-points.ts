import type { Message } from "../discussion/state.js";
import type { KeyPoint } from "./base.js";
import { contentTerms, hasMarker, polarity, splitSentences } from "./text.js";

/**
 * Extract up to maxPoints key points from a message.
 *
 * Sentences with importance, agreement or proposal markers are preferred, in
 * order; a message without any falls back to its first sentences. Sentences
 * with no content terms carry nothing to compare and are dropped. A sentence
 * with no stance of its own takes the stance of the whole message.
 */
export function extractKeyPoints(
  message: Message,
  maxPoints: number,
  exclude: ReadonlySet<string>,
): KeyPoint[] {
  const sentences = splitSentences(message.content);
  const marked = sentences.filter((s) => hasMarker(s));
  const chosen = (marked.length > 0 ? marked : sentences).slice(0, maxPoints);
  const messagePolarity = polarity(message.content);

  const points: KeyPoint[] = [];
  for (const text of chosen) {
    const terms = contentTerms(text, exclude);
    if (terms.size === 0) continue;
    const own = polarity(text);
    points.push({
      roleId: message.roleId,
      turnIndex: message.turnIndex,
      text,
      terms,
      polarity: own !== 0 ? own : messagePolarity,
    });
  }
  return points;
}
