import type { IGenerator, GenerateOptions, GenerateResult } from "./base.js";
import { Backoff, type BackoffOptions } from "./backoff.js";
import { GenerationError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("retry");

export interface RetryOptions extends BackoffOptions {
  /** Attempts after the first one. 0 = no retry. */
  maxRetries: number;
}

/**
 * Wraps a generator with retry + exponential backoff.
 *
 * Only retryable GenerationErrors are retried (timeouts, network failures,
 * 5xx/408/429). Anything else, or the last failure, is rethrown unchanged:
 * callers treat it as final.
 */
export class RetryingGenerator implements IGenerator {
  readonly name: string;

  constructor(
    private readonly inner: IGenerator,
    private readonly options: RetryOptions,
  ) {
    this.name = inner.name;
  }

  isAvailable(): Promise<boolean> {
    return this.inner.isAvailable();
  }

  async generate(prompt: string, options: GenerateOptions): Promise<GenerateResult> {
    const backoff = new Backoff(this.options);
    for (;;) {
      try {
        const result = await this.inner.generate(prompt, options);
        backoff.succeed();
        return result;
      } catch (err) {
        if (!(err instanceof GenerationError) || !err.retryable
          || backoff.consecutiveFailures >= this.options.maxRetries) {
          throw err;
        }
        log.warn(this.name, `attempt ${backoff.consecutiveFailures + 1} failed (${err.message}), retrying`);
        await backoff.wait();
      }
    }
  }
}
