/**
 * Generator interface.
 *
 * A generator wraps a text-generation backend (Ollama, an OpenAI-compatible
 * server, a test double) and gives the discussion engine one uniform call.
 */

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface GenerateOptions {
  maxOutputTokens: number;
  temperature: number;
  /** Optional system prompt (role description) */
  systemPrompt?: string;
  stop?: string[];
  /** Timeout in milliseconds; derived from the prompt length when omitted */
  timeoutMs?: number;
}

export interface GenerateResult {
  text: string;
  /** Token usage for this call, when the backend reports it */
  usage?: TokenUsage;
  durationMs: number;
}

export interface IGenerator {
  /** Name used in logs (e.g. "ollama:llama3") */
  readonly name: string;

  /** Check that the backend answers and has the model */
  isAvailable(): Promise<boolean>;

  /** Generate one completion. Throws a GenerationError on failure. */
  generate(prompt: string, options: GenerateOptions): Promise<GenerateResult>;
}

/**
 * Dynamic timeout based on estimated prompt and response size:
 * base 15s + 15ms/token, max 10 min.
 */
export function calculateTimeout(promptLength: number, maxOutputTokens = 0): number {
  const estimatedTokens = Math.ceil(promptLength / 4) + maxOutputTokens;
  return Math.min(15_000 + estimatedTokens * 15, 600_000);
}

/** Rough token estimate used for budgets and context bounding (~4 chars/token). */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0 };
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
  };
}

export function totalTokens(t: TokenUsage): number {
  return t.inputTokens + t.outputTokens;
}
