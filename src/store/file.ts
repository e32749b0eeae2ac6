import { mkdir, readFile, readdir, rename, writeFile, unlink, access } from "node:fs/promises";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import type { ICheckpointStore, CheckpointSummary } from "./interfaces.js";
import { parseCheckpoint, toCheckpoint } from "./checkpoint.js";
import { createState, type DiscussionState } from "../discussion/state.js";
import { CorruptCheckpointError, InvalidSessionIdError, errorMessage } from "../errors.js";
import { createLogger, isValidSessionId } from "../logger.js";

const log = createLogger("checkpoint");

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * JSON checkpoint per session: <dir>/<sessionId>.json.
 *
 * Writes go to a temporary file in the same directory which is then renamed
 * over the target, so a reader sees either the old or the new document.
 */
export class FileCheckpointStore implements ICheckpointStore {
  constructor(readonly dir: string) {}

  pathFor(sessionId: string): string {
    if (!isValidSessionId(sessionId)) throw new InvalidSessionIdError(sessionId);
    return join(this.dir, `${sessionId}.json`);
  }

  async load(sessionId: string, topic: string): Promise<DiscussionState> {
    const path = this.pathFor(sessionId);
    try {
      const state = await this.readStrict(path);
      if (state === null) {
        log.debug("no checkpoint for", sessionId, "- starting fresh");
        return createState(topic);
      }
      log.info("resumed", sessionId, "at turn", state.turn);
      return state;
    } catch (err) {
      if (err instanceof CorruptCheckpointError) {
        log.warn(err.message, "- starting fresh");
        return createState(topic);
      }
      throw err;
    }
  }

  async save(sessionId: string, state: DiscussionState): Promise<void> {
    const path = this.pathFor(sessionId);
    await mkdir(this.dir, { recursive: true });
    const tmpPath = join(this.dir, `.${sessionId}.${randomUUID()}.tmp`);
    const doc = toCheckpoint(sessionId, state);
    try {
      await writeFile(tmpPath, JSON.stringify(doc, null, 2) + "\n", "utf-8");
      await rename(tmpPath, path);
    } catch (err) {
      await unlink(tmpPath).catch(() => undefined);
      throw err;
    }
    log.debug("saved", sessionId, "turn", state.turn);
  }

  async exists(sessionId: string): Promise<boolean> {
    try {
      await access(this.pathFor(sessionId));
      return true;
    } catch {
      return false;
    }
  }

  async read(sessionId: string): Promise<DiscussionState | null> {
    try {
      return await this.readStrict(this.pathFor(sessionId));
    } catch (err) {
      if (err instanceof CorruptCheckpointError) return null;
      throw err;
    }
  }

  async list(): Promise<CheckpointSummary[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const summaries: CheckpointSummary[] = [];
    for (const name of names) {
      if (!name.endsWith(".json") || name.startsWith(".")) continue;
      const sessionId = name.slice(0, -".json".length);
      if (!isValidSessionId(sessionId)) continue;
      const state = await this.read(sessionId);
      if (!state) continue;
      summaries.push({
        sessionId,
        topic: state.topic,
        turn: state.turn,
        status: state.status,
        consensusReached: state.consensusReached,
        updatedAt: state.updatedAt,
      });
    }
    return summaries.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  /**
   * Read and validate a checkpoint file.
   * Returns null when the file (or directory) does not exist; throws
   * CorruptCheckpointError when it exists but cannot be trusted.
   */
  private async readStrict(path: string): Promise<DiscussionState | null> {
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new CorruptCheckpointError(path, errorMessage(err));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new CorruptCheckpointError(path, `invalid JSON (${errorMessage(err)})`);
    }

    const parsed = parseCheckpoint(raw);
    if (!parsed.ok) throw new CorruptCheckpointError(path, parsed.reason);
    return parsed.state;
  }
}
