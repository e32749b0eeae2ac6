import type { IGenerator } from "./base.js";
import type { GeneratorConfig } from "../config.js";
import { OllamaAdapter } from "./ollama.js";
import { OpenAICompatAdapter } from "./openai-compat.js";
import { RetryingGenerator } from "./retry.js";
import { createLogger } from "../logger.js";

const log = createLogger("adapters");

/**
 * Create the configured generator, wrapped with retry/backoff
 * unless maxRetries is 0.
 */
export function createGenerator(config: GeneratorConfig): IGenerator {
  const generator = createAdapter(config);
  if (config.maxRetries === 0) return generator;
  return new RetryingGenerator(generator, {
    maxRetries: config.maxRetries,
    baseMs: config.retryBaseMs,
    maxMs: config.retryMaxMs,
  });
}

function createAdapter(config: GeneratorConfig): IGenerator {
  switch (config.type) {
    case "openai-compat":
      log.debug("creating OpenAICompatAdapter, model=" + config.model);
      return new OpenAICompatAdapter(config);
    case "ollama":
      log.debug("creating OllamaAdapter, model=" + config.model);
      return new OllamaAdapter(config);
  }
}

export { OllamaAdapter } from "./ollama.js";
export { OpenAICompatAdapter } from "./openai-compat.js";
export { RetryingGenerator } from "./retry.js";
export { Backoff } from "./backoff.js";
export type { IGenerator, GenerateOptions, GenerateResult, TokenUsage } from "./base.js";
