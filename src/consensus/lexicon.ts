import { readFileSync } from "node:fs";
import { z } from "zod";

/**
 * Word lists used by key-point extraction, stance scoring and term normalisation.
 * Stored in data/lexicon.json and loaded once per process.
 */

const LexiconFileSchema = z.object({
  stopwords: z.array(z.string()),
  markers: z.record(z.string(), z.array(z.string())),
  stance: z.object({
    support: z.array(z.string()),
    oppose: z.array(z.string()),
    negators: z.array(z.string()),
  }),
  concepts: z.record(z.string(), z.array(z.string())),
});

export interface Lexicon {
  stopwords: ReadonlySet<string>;
  /** Marker phrases (one or more words), all categories merged */
  markers: readonly string[];
  support: ReadonlySet<string>;
  oppose: ReadonlySet<string>;
  negators: ReadonlySet<string>;
  /** word → concept key */
  concepts: ReadonlyMap<string, string>;
  /** Words that carry stance or marker meaning only; never content terms */
  functionWords: ReadonlySet<string>;
}

const LEXICON_URL = new URL("../../data/lexicon.json", import.meta.url);

let cached: Lexicon | null = null;

export function buildLexicon(raw: unknown): Lexicon {
  const file = LexiconFileSchema.parse(raw);
  const lower = (xs: string[]) => xs.map((x) => x.toLowerCase());

  const markers = Object.values(file.markers).flatMap(lower);
  const support = new Set(lower(file.stance.support));
  const oppose = new Set(lower(file.stance.oppose));
  const negators = new Set(lower(file.stance.negators));

  const concepts = new Map<string, string>();
  for (const [concept, words] of Object.entries(file.concepts)) {
    for (const w of lower(words)) concepts.set(w, concept);
  }

  const functionWords = new Set<string>([...support, ...oppose, ...negators]);
  for (const phrase of markers) {
    for (const word of phrase.split(" ")) functionWords.add(word);
  }

  return {
    stopwords: new Set(lower(file.stopwords)),
    markers,
    support,
    oppose,
    negators,
    concepts,
    functionWords,
  };
}

export function getLexicon(): Lexicon {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(LEXICON_URL, "utf-8"));
    cached = buildLexicon(raw);
  }
  return cached;
}
