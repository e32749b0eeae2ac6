import { getLexicon, type Lexicon } from "./lexicon.js";

/** Lower-cased word tokens. Apostrophes inside words are kept ("don't"). */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .split(/[^a-z0-9']+/)
    .map((t) => t.replace(/^'+|'+$/g, ""))
    .filter((t) => t.length > 0);
}

/** Split text into trimmed sentences on terminal punctuation and line breaks. */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((s) => s.trim())
    .filter((s) => /[a-z]/i.test(s));
}

/** Light suffix stripping so "options"/"option" and "reviewed"/"review" meet. */
export function stem(word: string): string {
  if (word.length > 5 && word.endsWith("ing")) return word.slice(0, -3);
  if (word.length > 4 && word.endsWith("ed")) return word.slice(0, -2);
  if (word.length > 4 && word.endsWith("ly")) return word.slice(0, -2);
  if (word.length > 3 && word.endsWith("s") && !word.endsWith("ss")) return word.slice(0, -1);
  return word;
}

/** Map a token to its comparable form: concept key, else stem. */
export function normalizeTerm(token: string, lexicon: Lexicon = getLexicon()): string {
  const bare = token.endsWith("'s") ? token.slice(0, -2) : token;
  return lexicon.concepts.get(bare) ?? lexicon.concepts.get(stem(bare)) ?? stem(bare);
}

/**
 * Content terms of a text: tokens that are not stopwords, stance/marker words
 * or excluded words (typically the topic's own terms), normalised.
 */
export function contentTerms(
  text: string,
  exclude: ReadonlySet<string> = new Set(),
  lexicon: Lexicon = getLexicon(),
): Set<string> {
  const terms = new Set<string>();
  for (const token of tokenize(text)) {
    if (token.length < 3 || !/[a-z]/.test(token)) continue;
    if (lexicon.stopwords.has(token) || lexicon.functionWords.has(token)) continue;
    const term = normalizeTerm(token, lexicon);
    if (exclude.has(term)) continue;
    terms.add(term);
  }
  return terms;
}

/** Terms of the discussion topic, removed from point comparison. */
export function topicTerms(topic: string, lexicon: Lexicon = getLexicon()): Set<string> {
  return contentTerms(topic, new Set(), lexicon);
}

const FAMILY_PREFIX = 5;
const FAMILY_SHARE = 0.8;

/**
 * Whether two terms are the same word or the same word family: a shared
 * prefix of at least five letters covering 80% of the shorter term
 * ("automate"/"automation", "invoic"/"invoice").
 */
export function termsMatch(a: string, b: string): boolean {
  if (a === b) return true;
  const shorter = Math.min(a.length, b.length);
  if (shorter < FAMILY_PREFIX) return false;
  let shared = 0;
  while (shared < shorter && a[shared] === b[shared]) shared++;
  return shared >= FAMILY_PREFIX && shared >= FAMILY_SHARE * shorter;
}

function matchedCount(from: ReadonlySet<string>, to: ReadonlySet<string>): number {
  let n = 0;
  for (const t of from) {
    if (to.has(t) || [...to].some((u) => termsMatch(t, u))) n++;
  }
  return n;
}

/**
 * Dice coefficient of two term sets, with word-family matches counted as
 * shared: (matched in a + matched in b) / (|a| + |b|). 0 when either is empty.
 */
export function dice(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  return (matchedCount(a, b) + matchedCount(b, a)) / (a.size + b.size);
}

/** Whether a sentence contains any marker phrase on word boundaries. */
export function hasMarker(sentence: string, lexicon: Lexicon = getLexicon()): boolean {
  const padded = ` ${tokenize(sentence).join(" ")} `;
  return lexicon.markers.some((m) => padded.includes(` ${m} `));
}

export interface StanceCount {
  support: number;
  oppose: number;
}

/**
 * Count supportive and opposing words. A negator up to two tokens before a
 * stance word flips it ("not convinced" opposes, "no concerns" supports).
 */
export function countStance(text: string, lexicon: Lexicon = getLexicon()): StanceCount {
  const tokens = tokenize(text);
  let support = 0;
  let oppose = 0;
  tokens.forEach((token, i) => {
    const isSupport = lexicon.support.has(token);
    const isOppose = lexicon.oppose.has(token);
    if (!isSupport && !isOppose) return;
    const negated = tokens.slice(Math.max(0, i - 2), i).some((t) => lexicon.negators.has(t));
    if (isSupport !== negated) support++;
    else oppose++;
  });
  return { support, oppose };
}

/** -1, 0 or +1 from the balance of stance words. */
export function polarity(text: string, lexicon: Lexicon = getLexicon()): -1 | 0 | 1 {
  const { support, oppose } = countStance(text, lexicon);
  if (support > oppose) return 1;
  return support < oppose ? -1 : 0;
}

/** Stance score in [-1, 1]: (support - oppose) / (support + oppose). */
export function stanceScore(text: string, lexicon: Lexicon = getLexicon()): number {
  const { support, oppose } = countStance(text, lexicon);
  const total = support + oppose;
  return total === 0 ? 0 : (support - oppose) / total;
}
