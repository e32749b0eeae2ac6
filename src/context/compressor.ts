/**
 * Context compressor: keeps the verbatim history within a window.
 *
 * When the history grows past the window, the oldest messages are folded into
 * the running summary. Summaries are incremental: the summarizer sees the
 * previous summary plus only the messages being folded. If it fails, a
 * deterministic digest of the folded messages is appended instead.
 */

import type { DiscussionState, Message } from "../discussion/state.js";
import type { IGenerator } from "../adapters/base.js";
import { buildSummaryPrompt } from "../prompts.js";
import { SummarizationError, errorMessage } from "../errors.js";
import { createLogger, type SessionLog } from "../logger.js";

const log = createLogger("compressor");

export interface ISummarizer {
  summarize(topic: string, previousSummary: string, folded: Message[]): Promise<string>;
}

export interface GenerativeSummarizerOptions {
  maxOutputTokens: number;
  temperature?: number;
  roleNames?: ReadonlyMap<string, string>;
}

/** Summarizer that asks the generator for an updated summary. */
export class GenerativeSummarizer implements ISummarizer {
  constructor(
    private readonly generator: IGenerator,
    private readonly options: GenerativeSummarizerOptions,
  ) {}

  async summarize(topic: string, previousSummary: string, folded: Message[]): Promise<string> {
    const prompt = buildSummaryPrompt(topic, previousSummary, folded, this.options.roleNames ?? new Map());
    let text: string;
    try {
      const result = await this.generator.generate(prompt, {
        maxOutputTokens: this.options.maxOutputTokens,
        temperature: this.options.temperature ?? 0.3,
      });
      text = result.text.trim();
    } catch (err) {
      throw new SummarizationError(`summary generation failed: ${errorMessage(err)}`);
    }
    if (!text) throw new SummarizationError("summary generation returned empty text");
    return text;
  }
}

/** Deterministic digest: one "[turn N] role: content" line per folded message. */
export function fallbackSummary(previousSummary: string, folded: Message[], maxChars: number): string {
  const lines = folded.map((m) => {
    const content = m.content.replace(/\s+/g, " ").trim();
    const short = content.length > maxChars ? content.slice(0, maxChars - 3).trimEnd() + "..." : content;
    return `[turn ${m.turnIndex}] ${m.roleId}: ${short}`;
  });
  return [previousSummary, ...lines].filter((s) => s.length > 0).join("\n");
}

export interface CompressorOptions {
  fallbackCharsPerMessage: number;
  sessionLog?: SessionLog | null;
}

export class ContextCompressor {
  constructor(
    private readonly summarizer: ISummarizer | null,
    private readonly options: CompressorOptions,
  ) {}

  /** Fold history beyond windowSize into the summary. Returns a new state. */
  async compress(state: DiscussionState, windowSize: number): Promise<DiscussionState> {
    const excess = state.history.length - windowSize;
    if (excess <= 0) return state;

    const folded = state.history.slice(0, excess);
    const kept = state.history.slice(excess);

    let summary: string;
    if (this.summarizer) {
      try {
        summary = await this.summarizer.summarize(state.topic, state.summary, folded);
      } catch (err) {
        const message = errorMessage(err);
        log.warn("summarization failed, using digest:", message);
        this.options.sessionLog?.write("warn", `summarization failed: ${message}`);
        summary = fallbackSummary(state.summary, folded, this.options.fallbackCharsPerMessage);
      }
    } else {
      summary = fallbackSummary(state.summary, folded, this.options.fallbackCharsPerMessage);
    }

    log.debug(`folded ${folded.length} message(s), summary now ${summary.length} chars`);
    return {
      ...state,
      history: kept,
      summary,
      foldedCount: state.foldedCount + folded.length,
    };
  }
}
