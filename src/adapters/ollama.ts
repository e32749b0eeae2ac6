import { z } from "zod";
import type { IGenerator, GenerateOptions, GenerateResult, TokenUsage } from "./base.js";
import { calculateTimeout } from "./base.js";
import { requestText, parseBody } from "./http.js";
import type { GeneratorConfig } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("ollama");

const OllamaGenerateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
  total_duration: z.number().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).optional(),
});

/**
 * Generator for Ollama via HTTP API.
 * Calls POST /api/generate on the configured endpoint (non-streaming).
 */
export class OllamaAdapter implements IGenerator {
  readonly name: string;
  private readonly model: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(config: Pick<GeneratorConfig, "model" | "endpoint" | "timeoutMs">) {
    this.model = config.model;
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs;
    this.name = `ollama:${this.model}`;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const raw = await requestText({
        method: "GET",
        url: `${this.endpoint}/api/tags`,
        timeoutMs: 5000,
        source: this.name,
      });
      const data = parseBody(this.name, raw, OllamaTagsSchema);
      const available = data.models?.some((m) => m.name.startsWith(this.model)) ?? false;
      log.debug(this.name, "isAvailable:", available);
      return available;
    } catch {
      log.debug(this.name, "isAvailable: false (connection failed)");
      return false;
    }
  }

  async generate(prompt: string, options: GenerateOptions): Promise<GenerateResult> {
    const timeoutMs = options.timeoutMs
      ?? (this.timeoutMs > 0 ? this.timeoutMs : calculateTimeout(prompt.length, options.maxOutputTokens));
    const start = Date.now();
    log.debug(this.name, "generate start, prompt length:", prompt.length);

    const body = {
      model: this.model,
      prompt,
      ...(options.systemPrompt ? { system: options.systemPrompt } : {}),
      stream: false,
      options: {
        temperature: options.temperature,
        num_predict: options.maxOutputTokens,
        ...(options.stop?.length ? { stop: options.stop } : {}),
      },
    };

    const raw = await requestText({
      method: "POST",
      url: `${this.endpoint}/api/generate`,
      body,
      timeoutMs,
      source: this.name,
    });

    const durationMs = Date.now() - start;
    const parsed = parseBody(this.name, raw, OllamaGenerateResponseSchema);

    // Ollama reports token counts directly
    const usage: TokenUsage | undefined =
      parsed.prompt_eval_count !== undefined || parsed.eval_count !== undefined
        ? {
            inputTokens: parsed.prompt_eval_count ?? 0,
            outputTokens: parsed.eval_count ?? 0,
          }
        : undefined;

    log.info(this.name, "generate complete:", durationMs + "ms" +
      (usage ? `, ${usage.inputTokens + usage.outputTokens} tokens` : ""));

    return { text: parsed.response.trim(), usage, durationMs };
  }
}
