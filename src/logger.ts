/**
 * Namespaced logger.
 *
 * Everything goes to stderr, filtered by CONCORD_LOG_LEVEL or --verbose/--debug.
 * After initFileLogging(dataDir) the logger also keeps:
 *   logs/info.log            info and above, all sessions
 *   logs/sessions/<id>.log   every prompt and reply of one session
 *
 * stdout belongs to the MCP transport and is never written.
 */

import {
  appendFileSync, readFileSync, writeFileSync,
  mkdirSync, statSync, readdirSync, unlinkSync,
} from "node:fs";
import { join } from "node:path";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };
const LEVEL_TAGS: Record<LogLevel, string> = { error: "ERR", warn: "WRN", info: "INF", debug: "DBG" };

const DAY_MS = 24 * 60 * 60 * 1000;
const STDERR_MAX_LINE = 800;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

const envLevel = process.env.CONCORD_LOG_LEVEL;
let stderrLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "warn";

export function setLogLevel(level: LogLevel): void {
  stderrLevel = level;
}

export function getLogLevel(): LogLevel {
  return stderrLevel;
}

// ── Files ───────────────────────────────────────────────────────────────

export interface LogRetention {
  info?: { maxDays?: number };
  sessions?: { maxFiles?: number; maxDays?: number };
}

interface LogFiles {
  infoPath: string;
  sessionsDir: string;
}

let files: LogFiles | null = null;

/**
 * Start writing log files under <dataDir>/logs and apply retention:
 * info.log lines older than info.maxDays (30) are dropped, and only the
 * sessions.maxFiles (50) newest session logs younger than sessions.maxDays
 * (14) are kept.
 */
export function initFileLogging(dataDir: string, retention: LogRetention = {}): void {
  const logsDir = join(dataDir, "logs");
  const sessionsDir = join(logsDir, "sessions");
  mkdirSync(sessionsDir, { recursive: true });
  files = { infoPath: join(logsDir, "info.log"), sessionsDir };

  const now = Date.now();
  dropOldLines(files.infoPath, now - (retention.info?.maxDays ?? 30) * DAY_MS);
  pruneSessionLogs(
    sessionsDir,
    retention.sessions?.maxFiles ?? 50,
    now - (retention.sessions?.maxDays ?? 14) * DAY_MS,
  );
}

/** Stop writing log files. Exported for testing only. */
export function disableFileLogging(): void {
  files = null;
}

/** Rewrite a log keeping only lines stamped at or after the cutoff. */
function dropOldLines(path: string, cutoffMs: number): void {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch {
    return; // nothing logged yet
  }
  const cutoff = new Date(cutoffMs).toISOString();
  const kept = content.split("\n").filter((line) => line.length > 0 && line.slice(0, 24) >= cutoff);
  writeFileSync(path, kept.map((line) => line + "\n").join(""));
}

function pruneSessionLogs(dir: string, maxFiles: number, cutoffMs: number): void {
  const logs = readdirSync(dir)
    .filter((name) => name.endsWith(".log"))
    .map((name) => ({ path: join(dir, name), mtimeMs: statSync(join(dir, name)).mtimeMs }))
    .sort((a, b) => b.mtimeMs - a.mtimeMs);

  logs.forEach((entry, index) => {
    if (index < maxFiles && entry.mtimeMs >= cutoffMs) return;
    try { unlinkSync(entry.path); } catch { /* already gone */ }
  });
}

// ── Formatting ──────────────────────────────────────────────────────────

/** Truncate a string for display. Full content goes to session log files. */
export function truncate(s: string, maxLen = 500): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen) + `... (${s.length} chars total)`;
}

function formatArgs(args: unknown[]): string {
  return args.map((a) => (typeof a === "string" ? a : JSON.stringify(a))).join(" ");
}

function write(level: LogLevel, tag: string, args: unknown[]): void {
  const message = formatArgs(args);

  if (LEVELS[level] <= LEVELS[stderrLevel]) {
    const short = message.length > STDERR_MAX_LINE
      ? message.slice(0, STDERR_MAX_LINE) + `... (${message.length} chars, full in session log)`
      : message;
    console.error(new Date().toISOString().slice(11, 23), LEVEL_TAGS[level], tag, short);
  }

  if (files && LEVELS[level] <= LEVELS.info) {
    const line = `${new Date().toISOString()} ${LEVEL_TAGS[level]} ${tag} ${message}\n`;
    try { appendFileSync(files.infoPath, line); } catch { /* log dir removed */ }
  }
}

// ── Per-session log ─────────────────────────────────────────────────────

export interface SessionLog {
  write: (level: LogLevel, message: string) => void;
  readonly path: string;
}

const SAFE_SESSION_ID = /^[a-zA-Z0-9_-]+$/;

/** Session ids double as file names: alphanumerics, "-" and "_", at most 128 chars. */
export function isValidSessionId(sessionId: string): boolean {
  return SAFE_SESSION_ID.test(sessionId) && sessionId.length <= 128;
}

/** Per-session log file, or null when file logging is off or the id is unsafe. */
export function createSessionLog(sessionId: string): SessionLog | null {
  if (!files) return null;
  if (!isValidSessionId(sessionId)) {
    write("warn", "[logger]", [`Invalid session id for log file (rejected): ${sessionId}`]);
    return null;
  }

  const path = join(files.sessionsDir, `${sessionId}.log`);
  return {
    write(level: LogLevel, message: string): void {
      const line = `${new Date().toISOString()} ${LEVEL_TAGS[level]} ${message}\n`;
      try { appendFileSync(path, line); } catch { /* log dir removed */ }
    },
    path,
  };
}

// ── Logger factory ──────────────────────────────────────────────────────

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(namespace: string) {
  const tag = `[${namespace}]`;
  return {
    error: (...args: unknown[]) => write("error", tag, args),
    warn:  (...args: unknown[]) => write("warn", tag, args),
    info:  (...args: unknown[]) => write("info", tag, args),
    debug: (...args: unknown[]) => write("debug", tag, args),
  };
}
