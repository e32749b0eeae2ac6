import { describe, it, expect } from "vitest";
import {
  tokenize,
  splitSentences,
  stem,
  contentTerms,
  topicTerms,
  dice,
  termsMatch,
  hasMarker,
  countStance,
  polarity,
  stanceScore,
} from "../consensus/text.js";
import { buildLexicon } from "../consensus/lexicon.js";

describe("tokenize", () => {
  it("lower-cases and keeps inner apostrophes", () => {
    expect(tokenize("We DON'T agree, 'really'!")).toEqual(["we", "don't", "agree", "really"]);
  });

  it("normalizes curly apostrophes", () => {
    expect(tokenize("Isn’t it")).toEqual(["isn't", "it"]);
  });
});

describe("splitSentences", () => {
  it("splits on terminal punctuation and newlines", () => {
    expect(splitSentences("First one. Second? Third!\nFourth")).toEqual([
      "First one.",
      "Second?",
      "Third!",
      "Fourth",
    ]);
  });

  it("drops fragments without letters", () => {
    expect(splitSentences("Yes. 42. ...")).toEqual(["Yes."]);
  });
});

describe("stem", () => {
  it("strips common suffixes", () => {
    expect(stem("options")).toBe("option");
    expect(stem("reviewed")).toBe("review");
    expect(stem("building")).toBe("build");
    expect(stem("quickly")).toBe("quick");
  });

  it("leaves short words and double s alone", () => {
    expect(stem("bus")).toBe("bus");
    expect(stem("process")).toBe("process");
    expect(stem("sing")).toBe("sing");
  });
});

describe("contentTerms", () => {
  it("drops stopwords and stance/marker words and maps concepts", () => {
    const terms = contentTerms("I agree with the pilot program idea.");
    expect([...terms].sort()).toEqual(["idea", "program", "test"]);
  });

  it("maps synonyms to one concept", () => {
    expect([...contentTerms("secure protection safety")]).toEqual(["security"]);
  });

  it("maps everyday paraphrases onto shared concepts", () => {
    const launch = contentTerms("I propose we launch gradually, starting with a small group of accounts.");
    const release = contentTerms("A staged release to a limited set of accounts first.");
    expect([...release].sort()).toEqual(["account", "group", "launch", "plan", "small", "start"]);
    expect([...launch].sort()).toEqual([...release].sort());
  });

  it("excludes the given terms", () => {
    const exclude = topicTerms("Should our team adopt a four-day work week?");
    expect([...exclude].sort()).toEqual(["adopt", "day", "four", "team", "week", "work"]);
    expect([...contentTerms("The team should work four days a week on testing", exclude)]).toEqual(["test"]);
  });
});

describe("dice", () => {
  it("computes 2|A∩B| / (|A|+|B|)", () => {
    expect(dice(new Set(["a", "b", "c"]), new Set(["b", "c", "d", "e", "f"]))).toBe(0.5);
  });

  it("is 0 for empty sets", () => {
    expect(dice(new Set(), new Set(["a"]))).toBe(0);
  });

  it("counts word-family matches as shared terms", () => {
    const automate = contentTerms("We should automate the invoicing workflow.");
    const automation = contentTerms("I agree that invoice automation is the answer.");
    expect([...automate]).toEqual(["automate", "invoic", "workflow"]);
    expect([...automation]).toEqual(["invoice", "automation", "answer"]);
    expect(dice(automate, automation)).toBeCloseTo(2 / 3);
  });
});

describe("termsMatch", () => {
  it("matches a long shared prefix", () => {
    expect(termsMatch("automate", "automation")).toBe(true);
    expect(termsMatch("invoic", "invoice")).toBe(true);
  });

  it("rejects short or partial overlaps", () => {
    expect(termsMatch("cost", "costly")).toBe(false);
    expect(termsMatch("community", "communication")).toBe(false);
    expect(termsMatch("program", "problem")).toBe(false);
  });
});

describe("hasMarker", () => {
  it("finds single-word and phrase markers on word boundaries", () => {
    expect(hasMarker("I propose a pilot.")).toBe(true);
    expect(hasMarker("We need more data.")).toBe(true);
    expect(hasMarker("The keyboard is broken.")).toBe(false);
  });
});

describe("stance", () => {
  it("counts support and opposition", () => {
    expect(countStance("I agree, this is a good plan.")).toEqual({ support: 2, oppose: 0 });
    expect(countStance("I disagree. It is risky.")).toEqual({ support: 0, oppose: 2 });
  });

  it("flips stance words preceded by a negator", () => {
    expect(countStance("I am not convinced.")).toEqual({ support: 0, oppose: 1 });
    expect(countStance("I have no concerns.")).toEqual({ support: 1, oppose: 0 });
  });

  it("derives polarity and score", () => {
    expect(polarity("I agree, but it is risky and wrong.")).toBe(-1);
    expect(polarity("The meeting is at noon.")).toBe(0);
    expect(stanceScore("I agree, but it is risky and wrong.")).toBeCloseTo(-1 / 3);
    expect(stanceScore("Nothing to say here.")).toBe(0);
  });
});

describe("buildLexicon", () => {
  it("rejects a malformed lexicon file", () => {
    expect(() => buildLexicon({ stopwords: [] })).toThrow();
  });

  it("treats marker phrase words as function words", () => {
    const lex = buildLexicon({
      stopwords: ["the"],
      markers: { proposal: ["we need"] },
      stance: { support: ["yes"], oppose: ["no"], negators: ["not"] },
      concepts: { money: ["cash", "funds"] },
    });
    expect(lex.functionWords.has("need")).toBe(true);
    expect(lex.concepts.get("funds")).toBe("money");
    expect([...contentTerms("we need the cash", new Set(), lex)]).toEqual(["money"]);
  });
});
