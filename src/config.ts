import { z } from "zod";
import { readFileSync, existsSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { homedir } from "node:os";
import { MAX_LLM_BAND } from "./consensus/base.js";

// --- Schemas ---

/** A role attribute may be written as one string or a list; it is always a list after parsing. */
const StringList = z
  .union([z.string(), z.array(z.string())])
  .transform((v) => (typeof v === "string" ? [v] : v).map((s) => s.trim()).filter((s) => s.length > 0))
  .default([]);

export const RoleConfigSchema = z.object({
  /** Identifier used on the command line and in checkpoints */
  id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/i, "role id must be alphanumeric/hyphens/underscores"),
  /** Display name, also used as "You are a {name}." */
  name: z.string().min(1),
  description: z.string().default(""),
  responsibilities: StringList,
  expertise: StringList,
  characteristics: StringList,
  examples: StringList,
});

export const GeneratorConfigSchema = z.object({
  type: z.enum(["ollama", "openai-compat"]).default("ollama"),
  model: z.string().default("llama3"),
  endpoint: z.string().default("http://localhost:11434").describe("API endpoint (no trailing path)"),
  apiKey: z.string().optional().describe("Bearer token for OpenAI-compatible providers"),
  /** Per-request timeout. 0 = derived from prompt length. */
  timeoutMs: z.number().int().min(0).default(0),
  maxRetries: z.number().int().min(0).max(10).default(3),
  retryBaseMs: z.number().int().min(0).default(1000),
  retryMaxMs: z.number().int().min(0).default(30_000),
});

export const DiscussionConfigSchema = z.object({
  maxTurns: z.number().int().min(1).default(30),
  /** Messages kept verbatim; older ones are folded into the summary */
  windowSize: z.number().int().min(1).default(6),
  /** Agreement ratio required for consensus (0-1) */
  threshold: z.number().min(0).max(1).default(0.7),
  /** "round" = check after every full rotation, "turn" = after every message */
  checkEvery: z.enum(["round", "turn"]).default("round"),
  /** "expertise" weights roles by how well their expertise matches the topic */
  weighting: z.enum(["none", "expertise"]).default("none"),
  similarityThreshold: z.number().min(0).max(1).default(0.3),
  maxPointsPerMessage: z.number().int().min(1).default(3),
  stabilityWindow: z.number().int().min(1).default(2),
  /** Ask the generator to confirm borderline consensus decisions */
  llmCheck: z.boolean().default(false),
  /** Distance from the threshold within which the generator is consulted */
  llmBand: z.number().min(0).max(MAX_LLM_BAND).default(0.1),
  deadlockThreshold: z.number().min(0).max(1).default(0.8),
  temperature: z.number().min(0).max(2).default(0.7),
  maxOutputTokens: z.number().int().min(1).default(512),
  summaryMaxTokens: z.number().int().min(1).default(200),
  fallbackCharsPerMessage: z.number().int().min(20).default(240),
  /** Approximate token budget for the verbatim messages in a turn prompt */
  contextTokenBudget: z.number().int().min(64).default(2048),
});

export const ConfigSchema = z.object({
  /** User identifier. Determines the data directory: data/<user>/. */
  user: z.string().default("default"),

  generator: GeneratorConfigSchema.default({}),

  /** Custom role definitions (extend or override built-ins) */
  roles: z.array(RoleConfigSchema).default([]),

  discussion: DiscussionConfigSchema.default({}),

  budget: z
    .object({
      /** Max total tokens (input + output) per discussion. 0 = unlimited. */
      maxTokensPerDiscussion: z.number().int().min(0).default(0),
      /** Warn when this percentage of the budget is consumed (0-100) */
      warnAtPercent: z.number().min(0).max(100).default(80),
      /** Estimated tokens per generation call (for pre-run estimation). */
      estimatedTokensPerInvocation: z.number().int().min(0).default(1500),
    })
    .default({})
    .describe("Token budget limits. A discussion stops as exhausted when the cap is reached."),

  checkpoints: z
    .object({
      /** Checkpoint directory. Default: <dataDir>/sessions */
      dir: z.string().optional(),
    })
    .default({}),

  logging: z
    .object({
      /** info.log lines older than this are dropped at startup */
      info: z.object({
        maxDays: z.number().int().min(1).default(30),
      }).default({}),
      /** Per-session logs (logs/sessions/): newest maxFiles younger than maxDays are kept */
      sessions: z.object({
        maxFiles: z.number().int().min(1).default(50),
        maxDays: z.number().int().min(1).default(14),
      }).default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RoleConfig = z.infer<typeof RoleConfigSchema>;
export type RoleConfigInput = z.input<typeof RoleConfigSchema>;
export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type DiscussionConfig = z.infer<typeof DiscussionConfigSchema>;
export type BudgetConfig = Config["budget"];

/** Directory where the loaded config file was found (null if defaults used). */
let loadedConfigDir: string | null = null;

/** Reset loadedConfigDir to null. Exported for testing only. */
export function resetLoadedConfigDir(): void {
  loadedConfigDir = null;
}

/**
 * Base data directory for a user.
 * - If a config file was loaded: resolves relative to its directory → <configDir>/data/<user>/
 * - Otherwise: uses XDG_DATA_HOME/concord/<user> (fallback ~/.local/share/concord/<user>)
 */
export function getUserDataDir(config: Config): string {
  if (loadedConfigDir) {
    return resolve(loadedConfigDir, "data", config.user);
  }
  const xdg = process.env.XDG_DATA_HOME || resolve(homedir(), ".local", "share");
  return resolve(xdg, "concord", config.user);
}

/** Where checkpoints live: explicit config value, else <dataDir>/sessions. */
export function getCheckpointDir(config: Config): string {
  if (config.checkpoints.dir) {
    return loadedConfigDir
      ? resolve(loadedConfigDir, config.checkpoints.dir)
      : resolve(config.checkpoints.dir);
  }
  return resolve(getUserDataDir(config), "sessions");
}

// --- Loader ---

export const CONFIG_FILENAMES = ["concord.config.json", ".concordrc.json"];

function parseFile(path: string): Config {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return ConfigSchema.parse(raw);
}

export function loadConfig(explicitPath?: string): Config {
  if (explicitPath) {
    loadedConfigDir = dirname(resolve(explicitPath));
    return parseFile(explicitPath);
  }

  for (const filename of CONFIG_FILENAMES) {
    const fullPath = resolve(process.cwd(), filename);
    if (existsSync(fullPath)) {
      loadedConfigDir = dirname(fullPath);
      return parseFile(fullPath);
    }
  }

  // No config file found; use defaults (XDG path via getUserDataDir)
  loadedConfigDir = null;
  return ConfigSchema.parse({});
}
