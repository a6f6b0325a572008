import { errorMessage, isTransientError } from "../errors.js";
import type { Story } from "../hn/index.js";
import { createLogger } from "../lib/logger.js";
import { timeoutSignal, withTimeout } from "../lib/retry.js";
import type { SummaryProvider } from "./providers.js";

const log = createLogger("summarize");

export type SummaryStatus = "success" | "failed";

export interface Summary {
  storyId: number;
  text: string;
  status: SummaryStatus;
  error?: string;
  /** Set on failures the provider may not repeat (timeouts, 429, 5xx) */
  retryable?: boolean;
}

export interface SummarizerOptions {
  maxLength: number;
  timeoutMs: number;
}

/**
 * Cut `text` to at most `maxLength` characters, preferring a word boundary,
 * and mark the cut with an ellipsis.
 */
export function truncateSummary(text: string, maxLength: number): string {
  const clean = text.trim();
  if (clean.length <= maxLength) return clean;
  if (maxLength <= 1) return clean.slice(0, maxLength);

  let hard = clean.slice(0, maxLength - 1);
  // Never split a surrogate pair
  const last = hard.charCodeAt(hard.length - 1);
  if (last >= 0xd800 && last <= 0xdbff) hard = hard.slice(0, -1);
  const lastSpace = hard.lastIndexOf(" ");
  const cut = lastSpace > maxLength / 2 ? hard.slice(0, lastSpace) : hard;
  return `${cut.trimEnd()}…`;
}

/**
 * Provider-agnostic summarization. Never throws: any provider failure comes
 * back as a failed Summary for that story.
 */
export class Summarizer {
  constructor(
    private readonly provider: SummaryProvider,
    private readonly options: SummarizerOptions
  ) {}

  get providerName(): string {
    return this.provider.name;
  }

  async summarize(
    story: Story,
    text: string,
    maxLength = this.options.maxLength,
    signal?: AbortSignal
  ): Promise<Summary> {
    if (!text.trim()) {
      return { storyId: story.id, text: "", status: "failed", error: "no article text", retryable: false };
    }

    try {
      log.info(`Summarizing: ${story.title}`);
      const output = await withTimeout(
        this.provider.summarize({
          story,
          text,
          maxLength,
          signal: timeoutSignal(this.options.timeoutMs, signal),
        }),
        this.options.timeoutMs,
        `${this.provider.name} summary`
      );

      const summary = truncateSummary(output, maxLength);
      if (!summary) {
        return { storyId: story.id, text: "", status: "failed", error: "provider returned an empty summary", retryable: true };
      }
      return { storyId: story.id, text: summary, status: "success" };
    } catch (error) {
      log.error(`Error summarizing story ${story.id}: ${errorMessage(error)}`);
      return {
        storyId: story.id,
        text: "",
        status: "failed",
        error: errorMessage(error),
        retryable: isTransientError(error),
      };
    }
  }
}
