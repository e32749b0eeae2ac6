import type { IGenerator, GenerateOptions, GenerateResult, TokenUsage } from "../adapters/base.js";
import { GenerationError } from "../errors.js";
import type { Message } from "../discussion/state.js";

/** Generator that replays a fixed script, one entry per call. */
export class ScriptedGenerator implements IGenerator {
  readonly name = "scripted";
  readonly prompts: string[] = [];
  readonly options: GenerateOptions[] = [];

  constructor(
    private readonly replies: Array<string | Error>,
    private readonly usage?: TokenUsage,
  ) {}

  get calls(): number {
    return this.prompts.length;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<GenerateResult> {
    this.prompts.push(prompt);
    this.options.push(options);
    const next = this.replies[this.prompts.length - 1];
    if (next === undefined) throw new GenerationError("script exhausted", false);
    if (next instanceof Error) throw next;
    return { text: next, usage: this.usage, durationMs: 1 };
  }
}

export function msg(roleId: string, turnIndex: number, content: string): Message {
  return { roleId, content, turnIndex, timestamp: new Date(Date.UTC(2026, 0, 1, 0, turnIndex)).toISOString() };
}

export const TOPIC = "Should our team adopt a four-day work week?";

/** First round: one proposal, two objections. */
export const ROUND_ONE = [
  "I propose a six month pilot program before any permanent change.",
  "I disagree with the pilot program because the trial would overload customer service.",
  "I oppose the pilot program until we understand the legal risks.",
];

/** Second round: objections answered, everyone behind the pilot. */
export const ROUND_TWO = [
  "We should run the pilot program with clear legal review and a service plan.",
  "I agree with the pilot program now that service load is covered.",
  "I support the pilot program with the legal review in place.",
];
