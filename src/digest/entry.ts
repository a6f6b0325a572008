import type { ExtractedContent } from "../extract/index.js";
import type { Story } from "../hn/index.js";
import type { Summary } from "../summarize/index.js";

/** One story's outcome for this run, in ranking order. */
export interface DigestEntry {
  /** 1-based position in the ranking */
  rank: number;
  story: Story;
  extraction: ExtractedContent;
  summary: Summary;
}

export function isDegraded(entry: DigestEntry): boolean {
  return entry.extraction.status === "failed" || entry.summary.status === "failed";
}

export function unavailableReason(entry: DigestEntry): string {
  if (entry.extraction.status === "failed") {
    return `article could not be extracted (${entry.extraction.error ?? "unknown error"})`;
  }
  return entry.summary.error ?? "unknown error";
}

/** The summary, or a placeholder saying why there is none. */
export function summaryOrPlaceholder(entry: DigestEntry): string {
  return entry.summary.status === "success"
    ? entry.summary.text
    : `Summary unavailable: ${unavailableReason(entry)}`;
}

export function hnItemUrl(storyId: number): string {
  return `https://news.ycombinator.com/item?id=${storyId}`;
}

/** Link target for the story title; self posts link to their discussion. */
export function storyUrl(story: Story): string {
  return story.url ?? hnItemUrl(story.id);
}

/** YYYY-MM-DD in local time */
export function formatDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
