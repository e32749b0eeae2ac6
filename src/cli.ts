#!/usr/bin/env node

/**
 * Concord CLI: command-line interface for multi-role discussions.
 *
 * Commands:
 *   concord discuss "topic" [--roles a,b,c] [--num-roles 3] [--max-turns 30] [--session <id>]
 *   concord roles
 *   concord status [session]
 *   concord init
 *   concord start
 */

import { parseArgs } from "node:util";
import { writeFileSync, existsSync } from "node:fs";
import { loadConfig, getUserDataDir, getCheckpointDir, type Config } from "./config.js";
import { createGenerator } from "./adapters/index.js";
import { FileCheckpointStore } from "./store/file.js";
import { DiscussionSession } from "./orchestrator.js";
import { listRoles } from "./roles.js";
import { pickRoles, formatResult, handleStatus } from "./handlers.js";
import { setLogLevel, initFileLogging } from "./logger.js";
import { errorMessage } from "./errors.js";

const USAGE = `Usage: concord <command> [options]

Commands:
  discuss <topic>          Run a discussion until consensus or the turn limit
  roles                    List available roles
  status [session]         List stored sessions, or show one session
  init                     Create concord.config.json
  start                    Start MCP server (stdio)

Options (discuss):
  --roles <a,b,c>          Role ids in speaking order (default: picked from the topic)
  --num-roles <n>          Number of roles to pick when --roles is omitted (default: 3)
  --max-turns <n>          Turn limit (default: from config)
  --window <n>             Messages kept verbatim in context (default: from config)
  --threshold <0-1>        Agreement ratio required for consensus (default: from config)
  --check-every <round|turn>  When to check for consensus (default: round)
  --max-tokens <n>         Token budget for this session (overrides config)
  --session <id>           Resume (or name) a session
  --llm-check              Ask the model to confirm borderline consensus decisions
  --estimate-only          Print a token estimate and exit
  --output <file>          Write the result as JSON

Global:
  --verbose                Show info-level logs on stderr
  --debug                  Show all logs (debug level) on stderr
  --help                   Show this help
  --version                Show version

Environment:
  CONCORD_LOG_LEVEL        Set log level: error, warn (default), info, debug

Examples:
  concord discuss "Should the city adopt a four-day work week?"
  concord discuss "Rollout plan for passkeys" --roles moderator,security,product --max-turns 12
  concord discuss "Rollout plan for passkeys" --session passkeys-1 --max-turns 18
`;

async function main() {
  const rawArgs = process.argv.slice(2);

  // Process global flags before anything else
  if (rawArgs.includes("--debug")) {
    setLogLevel("debug");
  } else if (rawArgs.includes("--verbose")) {
    setLogLevel("info");
  }
  const args = rawArgs.filter((a) => a !== "--verbose" && a !== "--debug");

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  if (args[0] === "--version" || args[0] === "-v") {
    console.log("concord v0.1.0");
    process.exit(0);
  }

  const command = args[0];

  // "init" has no config yet, "start" (server) initializes its own logging
  if (command !== "init" && command !== "start") {
    const cfg = loadConfig();
    initFileLogging(getUserDataDir(cfg), cfg.logging);
  }

  switch (command) {
    case "discuss":
      await cmdDiscuss(args.slice(1));
      break;
    case "roles":
      cmdRoles();
      break;
    case "status":
      await cmdStatus(args.slice(1));
      break;
    case "init":
      cmdInit();
      break;
    case "start":
      cmdStart();
      break;
    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exit(1);
  }
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function intOption(name: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) fail(`--${name} must be an integer >= ${min} (got "${raw}")`);
  return n;
}

function ratioOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0 || n > 1) fail(`--${name} must be a number between 0 and 1 (got "${raw}")`);
  return n;
}

function withOverrides(config: Config, llmCheck: boolean): Config {
  return llmCheck ? { ...config, discussion: { ...config.discussion, llmCheck: true } } : config;
}

async function cmdDiscuss(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      roles: { type: "string" },
      "num-roles": { type: "string" },
      "max-turns": { type: "string" },
      window: { type: "string" },
      threshold: { type: "string" },
      "check-every": { type: "string" },
      "max-tokens": { type: "string" },
      session: { type: "string" },
      "llm-check": { type: "boolean", default: false },
      "estimate-only": { type: "boolean", default: false },
      output: { type: "string" },
    },
    allowPositionals: true,
  });

  const topic = positionals.join(" ").trim();
  if (!topic) {
    console.error("Error: discuss requires a topic\n");
    console.log('Usage: concord discuss "your topic" [--roles a,b,c] [--max-turns n] [--session <id>]');
    process.exit(1);
  }

  const checkEvery = values["check-every"];
  if (checkEvery !== undefined && checkEvery !== "round" && checkEvery !== "turn") {
    fail(`--check-every must be "round" or "turn" (got "${checkEvery}")`);
  }

  const config = withOverrides(loadConfig(), values["llm-check"] ?? false);
  const numRoles = intOption("num-roles", values["num-roles"], 2) ?? 3;
  const maxTurns = intOption("max-turns", values["max-turns"], 1);
  const windowSize = intOption("window", values.window, 1);
  const maxTokens = intOption("max-tokens", values["max-tokens"], 0);
  const threshold = ratioOption("threshold", values.threshold);

  const roleIds = values.roles?.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
  const generator = createGenerator(config.generator);
  const store = new FileCheckpointStore(getCheckpointDir(config));
  const ctx = { config, generator, store };
  const roles = pickRoles(ctx, topic, roleIds, numRoles);

  const session = new DiscussionSession({ generator, store }, config.discussion, config.budget);

  if (values["estimate-only"]) {
    const existing = values.session ? await store.read(values.session) : null;
    const estimate = session.estimate({ maxTurns, turnsDone: existing?.turn ?? 0, windowSize, maxTokens });
    console.log(JSON.stringify(estimate, null, 2));
    return;
  }

  console.log("Checking generator availability...");
  const available = await generator.isAvailable();
  console.log(`  ${generator.name}: ${available ? "OK" : "NOT AVAILABLE"}`);
  if (!available) {
    fail(`generator "${generator.name}" is not available. Check that it's running and the model is installed.`);
  }

  console.log(`\nDiscussion: "${topic}"`);
  console.log(`  Roles: ${roles.map((r) => r.name).join(", ")}`);
  console.log("");

  // Ctrl-C stops after the current turn; the checkpoint keeps everything so far
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("\nStopping after the current turn...");
    controller.abort();
  });

  const result = await session.run({
    topic,
    roles,
    sessionId: values.session,
    maxTurns,
    windowSize,
    threshold,
    checkEvery,
    maxTokens,
    signal: controller.signal,
  });

  const roleNames = new Map(roles.map((r) => [r.id, r.name]));
  console.log("=".repeat(60));
  console.log(formatResult(result, roleNames));

  if (values.output) {
    const { state: _state, ...serializable } = result;
    writeFileSync(values.output, JSON.stringify(serializable, null, 2) + "\n");
    console.log(`\nResult written to ${values.output}`);
  }

  if (result.aborted && result.abortReason !== "cancelled") {
    process.exitCode = 2;
  }
}

function cmdRoles() {
  const config = loadConfig();
  console.log("Available roles:\n");
  for (const role of listRoles(config)) {
    const expertise = role.expertise.length > 0 ? ` [${role.expertise.join(", ")}]` : "";
    console.log(`  ${role.id.padEnd(12)} ${role.name}${expertise}`);
  }
}

async function cmdStatus(args: string[]) {
  const config = loadConfig();
  const store = new FileCheckpointStore(getCheckpointDir(config));
  const generator = createGenerator(config.generator);
  console.log(await handleStatus({ config, generator, store }, args[0]));
}

function cmdInit() {
  const filename = "concord.config.json";
  if (existsSync(filename)) {
    console.log(`${filename} already exists. Skipping.`);
    return;
  }

  const defaultConfig = {
    user: "default",
    generator: {
      type: "ollama",
      model: "llama3",
      endpoint: "http://localhost:11434",
    },
    discussion: {
      maxTurns: 30,
      windowSize: 6,
      threshold: 0.7,
    },
    roles: [],
  };

  writeFileSync(filename, JSON.stringify(defaultConfig, null, 2) + "\n");
  console.log(`Created ${filename}`);
  console.log("Edit it to choose a model and add custom roles.");
}

function cmdStart() {
  console.error("Starting Concord MCP server (stdio)...");
  import("./server.js").catch((err: unknown) => {
    console.error("Failed to start server:", errorMessage(err));
    process.exit(1);
  });
}

main().catch((err: unknown) => {
  console.error("Error:", errorMessage(err));
  process.exit(1);
});
