/**
 * Typed error classes for the discussion engine.
 *
 * GenerationError            a generation call failed (timeout, network, bad payload)
 * CorruptCheckpointError     a checkpoint exists but cannot be trusted
 * SummarizationError         the summarizer could not fold messages
 * InsufficientRolesError     fewer than two distinct roles were supplied
 * SessionMismatchError       a stored session belongs to another topic
 * InvalidSessionIdError      a session id is unsafe for use in file paths
 */

export class ConcordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConcordError";
  }
}

export class GenerationError extends ConcordError {
  /** Whether a retry has a reasonable chance of succeeding. */
  readonly retryable: boolean;

  constructor(message: string, retryable = true) {
    super(message);
    this.name = "GenerationError";
    this.retryable = retryable;
  }
}

export class GenerationTimeoutError extends GenerationError {
  readonly timeoutMs: number;

  constructor(source: string, timeoutMs: number) {
    super(`${source}: request timeout after ${timeoutMs}ms`);
    this.name = "GenerationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class GenerationConnectionError extends GenerationError {
  /** HTTP status when the server answered, undefined on network failure. */
  readonly status?: number;

  constructor(message: string, status?: number) {
    // 4xx other than 408/429 will not get better by asking again
    const retryable = status === undefined || status >= 500 || status === 408 || status === 429;
    super(message, retryable);
    this.name = "GenerationConnectionError";
    this.status = status;
  }
}

export class MalformedResponseError extends GenerationError {
  constructor(message: string) {
    super(message, false);
    this.name = "MalformedResponseError";
  }
}

export class CorruptCheckpointError extends ConcordError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Corrupt checkpoint ${path}: ${reason}`);
    this.name = "CorruptCheckpointError";
    this.path = path;
  }
}

export class SummarizationError extends ConcordError {
  constructor(message: string) {
    super(message);
    this.name = "SummarizationError";
  }
}

export class InsufficientRolesError extends ConcordError {
  readonly count: number;

  constructor(count: number) {
    super(`At least 2 distinct roles are required for a discussion (got ${count}).`);
    this.name = "InsufficientRolesError";
    this.count = count;
  }
}

export class SessionMismatchError extends ConcordError {
  constructor(sessionId: string, storedTopic: string, requestedTopic: string) {
    super(
      `Session "${sessionId}" was started for topic "${storedTopic}", ` +
      `cannot continue it with topic "${requestedTopic}".`
    );
    this.name = "SessionMismatchError";
  }
}

export class InvalidSessionIdError extends ConcordError {
  constructor(sessionId: string) {
    super(`Invalid session ID: "${sessionId}". Must be alphanumeric/hyphens/underscores, max 128 chars.`);
    this.name = "InvalidSessionIdError";
  }
}

/** Extract a printable message from anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
