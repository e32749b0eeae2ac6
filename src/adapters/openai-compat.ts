import { z } from "zod";
import type { IGenerator, GenerateOptions, GenerateResult, TokenUsage } from "./base.js";
import { calculateTimeout } from "./base.js";
import { requestText, parseBody } from "./http.js";
import { MalformedResponseError } from "../errors.js";
import type { GeneratorConfig } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("openai-compat");

interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

const ChatCompletionResponseSchema = z.object({
  id: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({
      role: z.string().optional(),
      content: z.string().nullable().optional(),
    }),
    finish_reason: z.string().nullable().optional(),
  })),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
  }).optional(),
});

const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.string() })).optional(),
});

/**
 * Generator for any OpenAI-compatible chat completions API.
 *
 * Works with: LM Studio, Ollama (/v1), vLLM, llama.cpp, LocalAI,
 * Groq, Mistral, Together AI, OpenAI.
 *
 * Uses the standard POST /v1/chat/completions endpoint.
 */
export class OpenAICompatAdapter implements IGenerator {
  readonly name: string;
  private readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(config: Pick<GeneratorConfig, "model" | "endpoint" | "apiKey" | "timeoutMs">) {
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.name = `openai-compat:${this.model}`;
  }

  private headers(): Record<string, string> {
    return this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {};
  }

  async isAvailable(): Promise<boolean> {
    try {
      const raw = await requestText({
        method: "GET",
        url: `${this.endpoint}/v1/models`,
        headers: this.headers(),
        timeoutMs: 5000,
        source: this.name,
      });
      const data = parseBody(this.name, raw, ModelListSchema);
      if (data.data) {
        const found = data.data.some((m) => m.id === this.model || m.id.includes(this.model));
        log.debug(this.name, "isAvailable:", found);
        return found;
      }
      // Some providers don't list models; if we got a response, assume available
      log.debug(this.name, "isAvailable: true (endpoint responded, model list not checked)");
      return true;
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

    const messages: ChatMessage[] = [];
    if (options.systemPrompt) {
      messages.push({ role: "system", content: options.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    const body = {
      model: this.model,
      messages,
      max_tokens: options.maxOutputTokens,
      temperature: options.temperature,
      ...(options.stop?.length ? { stop: options.stop } : {}),
      stream: false,
    };

    const url = `${this.endpoint}/v1/chat/completions`;
    const raw = await requestText({
      method: "POST",
      url,
      body,
      headers: this.headers(),
      timeoutMs,
      source: this.name,
    });
    const durationMs = Date.now() - start;

    const parsed = parseBody(this.name, raw, ChatCompletionResponseSchema);
    const first = parsed.choices[0];
    if (!first) {
      throw new MalformedResponseError(`${this.name}: empty response from ${url}`);
    }

    const usage: TokenUsage | undefined = parsed.usage
      ? {
          inputTokens: parsed.usage.prompt_tokens ?? 0,
          outputTokens: parsed.usage.completion_tokens ?? 0,
        }
      : undefined;

    log.info(this.name, "generate complete:", durationMs + "ms" +
      (usage ? `, ${usage.inputTokens + usage.outputTokens} tokens` : ""));

    return { text: (first.message.content ?? "").trim(), usage, durationMs };
  }
}
