import type { Message } from "../discussion/state.js";
import type { IGenerator } from "../adapters/base.js";
import { buildConsensusCheckPrompt, parseConsensusVerdict } from "../prompts.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("consensus-check");

/** Asks whether the window shows agreement. null = no usable verdict. */
export interface IConsensusChecker {
  check(topic: string, window: Message[]): Promise<boolean | null>;
}

export interface GenerativeCheckOptions {
  /** Messages shown to the generator, newest last */
  lastMessages?: number;
  maxOutputTokens?: number;
  temperature?: number;
  roleNames?: ReadonlyMap<string, string>;
}

export class GenerativeConsensusCheck implements IConsensusChecker {
  constructor(
    private readonly generator: IGenerator,
    private readonly options: GenerativeCheckOptions = {},
  ) {}

  async check(topic: string, window: Message[]): Promise<boolean | null> {
    const messages = window.slice(-(this.options.lastMessages ?? 6));
    const prompt = buildConsensusCheckPrompt(topic, messages, this.options.roleNames ?? new Map());
    try {
      const result = await this.generator.generate(prompt, {
        maxOutputTokens: this.options.maxOutputTokens ?? 150,
        temperature: this.options.temperature ?? 0.2,
      });
      const verdict = parseConsensusVerdict(result.text);
      if (verdict === null) {
        log.warn("no CONSENSUS verdict in reply, ignoring:", result.text.slice(0, 120));
      }
      return verdict;
    } catch (err) {
      log.warn("consensus check failed, ignoring:", errorMessage(err));
      return null;
    }
  }
}
