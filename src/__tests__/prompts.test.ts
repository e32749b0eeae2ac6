import { describe, it, expect } from "vitest";
import {
  buildTurnPrompt,
  buildConsensusCheckPrompt,
  fitToBudget,
  parseConsensusVerdict,
  type TurnPromptInput,
} from "../prompts.js";
import { getRole } from "../roles.js";
import type { RoleConfig } from "../config.js";
import { msg } from "./helpers.js";

const noNames = new Map<string, string>();

function critic(): RoleConfig {
  const role = getRole("critic");
  if (!role) throw new Error("critic role missing");
  return role;
}

function input(overrides: Partial<TurnPromptInput> = {}): TurnPromptInput {
  return {
    role: critic(),
    topic: "Tabs or spaces?",
    summary: "",
    recent: [],
    turnNumber: 1,
    maxTurns: 10,
    roleNames: noNames,
    contextTokenBudget: 2048,
    ...overrides,
  };
}

describe("fitToBudget", () => {
  // "[a] " + 36 chars = 40 chars = 10 tokens each
  const messages = [1, 2, 3].map((i) => msg("a", i, "x".repeat(36)));

  it("keeps the newest messages that fit", () => {
    expect(fitToBudget(messages, noNames, 25).map((m) => m.turnIndex)).toEqual([2, 3]);
    expect(fitToBudget(messages, noNames, 30).map((m) => m.turnIndex)).toEqual([1, 2, 3]);
  });

  it("always keeps the last message", () => {
    expect(fitToBudget(messages, noNames, 5).map((m) => m.turnIndex)).toEqual([3]);
  });
});

describe("buildTurnPrompt", () => {
  it("opens the discussion when there is no history", () => {
    const prompt = buildTurnPrompt(input());
    expect(prompt.startsWith("You are a Devil's Advocate.\n")).toBe(true);
    expect(prompt).toContain("Discussion topic: Tabs or spaces?");
    expect(prompt).toContain("Turn 1 of 10.");
    expect(prompt).toContain("You are opening the discussion.");
    expect(prompt).not.toContain("Summary of the discussion so far");
  });

  it("includes summary, recent messages and the agreement reading", () => {
    const prompt = buildTurnPrompt(input({
      summary: "[turn 1] engineer: Spaces.",
      recent: [msg("engineer", 2, "Spaces keep diffs stable.")],
      roleNames: new Map([["engineer", "Software Engineer"]]),
      turnNumber: 3,
      consensus: { ratio: 0.666, agreedPoint: "Use spaces." },
    }));
    expect(prompt).toContain("Summary of the discussion so far:\n[turn 1] engineer: Spaces.");
    expect(prompt).toContain("Recent messages:\n[Software Engineer] Spaces keep diffs stable.");
    expect(prompt).toContain('Current agreement: 67% of participants support "Use spaces.".');
    expect(prompt).not.toContain("Moderator note");
  });

  it("adds the moderator note when deadlocked", () => {
    expect(buildTurnPrompt(input({ deadlockNote: true }))).toContain("Moderator note:");
  });
});

describe("consensus check prompt", () => {
  it("lists the messages and asks for a verdict line", () => {
    const prompt = buildConsensusCheckPrompt("Tabs or spaces?", [msg("a", 1, "Spaces."), msg("b", 2, "Agreed.")], noNames);
    expect(prompt).toContain("Recent messages:\n[a] Spaces.\n\n[b] Agreed.");
    expect(prompt).toContain("CONSENSUS: YES or CONSENSUS: NO");
  });

  it("parses the verdict", () => {
    expect(parseConsensusVerdict("CONSENSUS: YES\nEveryone prefers spaces.")).toBe(true);
    expect(parseConsensusVerdict("Final answer, consensus:no")).toBe(false);
    expect(parseConsensusVerdict("CONSENSUS: YESTERDAY")).toBeNull();
    expect(parseConsensusVerdict("I am not sure.")).toBeNull();
  });
});
