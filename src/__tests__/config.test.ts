import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { resolve, join } from "node:path";
import { homedir, tmpdir } from "node:os";
import {
  ConfigSchema,
  RoleConfigSchema,
  getCheckpointDir,
  getUserDataDir,
  loadConfig,
  resetLoadedConfigDir,
} from "../config.js";

describe("ConfigSchema.parse", () => {
  it("parses empty object with all defaults", () => {
    const config = ConfigSchema.parse({});
    expect(config.user).toBe("default");
    expect(config.generator).toMatchObject({ type: "ollama", model: "llama3", maxRetries: 3 });
    expect(config.discussion).toMatchObject({
      maxTurns: 30,
      windowSize: 6,
      threshold: 0.7,
      checkEvery: "round",
      llmCheck: false,
    });
    expect(config.roles).toEqual([]);
    expect(config.budget.maxTokensPerDiscussion).toBe(0);
    expect(config.budget.warnAtPercent).toBe(80);
  });

  it("accepts a full config", () => {
    const config = ConfigSchema.parse({
      user: "alice",
      generator: { type: "openai-compat", model: "gpt-test", endpoint: "http://localhost:8080", apiKey: "test-secret" },
      discussion: { maxTurns: 12, threshold: 0.8, weighting: "expertise" },
      budget: { maxTokensPerDiscussion: 50000, warnAtPercent: 70 },
    });
    expect(config.user).toBe("alice");
    expect(config.generator.apiKey).toBe("test-secret");
    expect(config.discussion.maxTurns).toBe(12);
    expect(config.discussion.windowSize).toBe(6);
    expect(config.discussion.weighting).toBe("expertise");
    expect(config.budget.maxTokensPerDiscussion).toBe(50000);
  });

  it("rejects out-of-range values", () => {
    expect(() => ConfigSchema.parse({ discussion: { threshold: 1.5 } })).toThrow();
    expect(() => ConfigSchema.parse({ discussion: { maxTurns: 0 } })).toThrow();
    expect(() => ConfigSchema.parse({ generator: { type: "claude" } })).toThrow();
  });

  it("keeps the generative check band near the threshold", () => {
    expect(ConfigSchema.parse({ discussion: { llmBand: 0.15 } }).discussion.llmBand).toBe(0.15);
    expect(() => ConfigSchema.parse({ discussion: { llmBand: 0.5 } })).toThrow();
  });

  it("reads log retention settings", () => {
    const config = ConfigSchema.parse({ logging: { sessions: { maxFiles: 5 } } });
    expect(config.logging).toEqual({ info: { maxDays: 30 }, sessions: { maxFiles: 5, maxDays: 14 } });
  });
});

describe("RoleConfigSchema", () => {
  it("turns single strings into lists and drops blanks", () => {
    const role = RoleConfigSchema.parse({
      id: "auditor",
      name: "Auditor",
      responsibilities: "Check the numbers",
      expertise: ["accounting", "  ", " tax "],
    });
    expect(role.responsibilities).toEqual(["Check the numbers"]);
    expect(role.expertise).toEqual(["accounting", "tax"]);
    expect(role.characteristics).toEqual([]);
    expect(role.description).toBe("");
  });

  it("rejects ids unsafe for the command line", () => {
    expect(() => RoleConfigSchema.parse({ id: "two words", name: "X" })).toThrow();
  });
});

describe("getUserDataDir", () => {
  afterEach(() => resetLoadedConfigDir());

  it("uses XDG fallback when no config file loaded", () => {
    resetLoadedConfigDir();
    const config = ConfigSchema.parse({ user: "testuser" });
    const xdg = process.env.XDG_DATA_HOME || resolve(homedir(), ".local", "share");
    expect(getUserDataDir(config)).toBe(resolve(xdg, "concord", "testuser"));
    expect(getCheckpointDir(config)).toBe(resolve(xdg, "concord", "testuser", "sessions"));
  });

  it("resolves paths next to a loaded config file", () => {
    const dir = mkdtempSync(join(tmpdir(), "concord-cfg-"));
    try {
      const path = join(dir, "concord.config.json");
      writeFileSync(path, JSON.stringify({ user: "bob", checkpoints: { dir: "state" } }));
      const config = loadConfig(path);
      expect(config.user).toBe("bob");
      expect(getUserDataDir(config)).toBe(resolve(dir, "data", "bob"));
      expect(getCheckpointDir(config)).toBe(resolve(dir, "state"));
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("rejects an invalid config file", () => {
    const dir = mkdtempSync(join(tmpdir(), "concord-cfg-"));
    try {
      const path = join(dir, "concord.config.json");
      writeFileSync(path, JSON.stringify({ discussion: { windowSize: "six" } }));
      expect(() => loadConfig(path)).toThrow();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
