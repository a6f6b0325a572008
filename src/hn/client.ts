import type { FetcherSettings } from "../config/index.js";
import { errorMessage, FetchError, isTransientStatus } from "../errors.js";
import { createLogger } from "../lib/logger.js";
import { sleep, timeoutSignal, withRetry } from "../lib/retry.js";
import type { DroppedStory, FetchResult, HNItem, Story } from "./types.js";

const log = createLogger("hn");

export class HNClient {
  constructor(private readonly settings: FetcherSettings) {}

  private async fetch<T>(path: string, signal?: AbortSignal): Promise<T> {
    const url = `${this.settings.baseUrl}${path}`;
    const response = await fetch(url, {
      headers: { Accept: "application/json" },
      signal: timeoutSignal(this.settings.timeoutMs, signal),
    });

    if (!response.ok) {
      throw new FetchError(`GET ${url} failed: ${response.status}`, {
        transient: isTransientStatus(response.status),
      });
    }

    return response.json() as Promise<T>;
  }

  private retrying<T>(label: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(fn, {
      attempts: this.settings.attempts,
      baseDelayMs: this.settings.baseDelayMs,
      signal,
      onRetry: (error, attempt, delayMs) =>
        log.warn(`${label} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${errorMessage(error)}`),
    });
  }

  /**
   * Ranked story ids, truncated to `limit`. Throws FetchError once the
   * retry budget is spent.
   */
  async getTopStoryIds(limit: number, signal?: AbortSignal): Promise<number[]> {
    try {
      const ids = await this.retrying(
        "topstories",
        () => this.fetch<unknown>("/topstories.json", signal),
        signal
      );
      if (!Array.isArray(ids)) {
        throw new FetchError("topstories.json did not return a list");
      }
      return ids.filter((id): id is number => typeof id === "number").slice(0, limit);
    } catch (error) {
      if (error instanceof FetchError) throw error;
      throw new FetchError(`Could not fetch top stories: ${errorMessage(error)}`, { cause: error });
    }
  }

  async getItem(id: number, signal?: AbortSignal): Promise<HNItem | null> {
    return this.retrying(`item ${id}`, () => this.fetch<HNItem | null>(`/item/${id}.json`, signal), signal);
  }

  /**
   * Top `limit` stories in ranking order. A story whose details cannot be
   * loaded is dropped and reported; only the ranking call is fatal.
   */
  async fetchTopStories(limit: number, signal?: AbortSignal): Promise<FetchResult> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }

    const ids = await this.getTopStoryIds(limit, signal);
    log.debug(`Fetched ${ids.length} top story ids`);

    const stories: Story[] = [];
    const dropped: DroppedStory[] = [];

    for (const [index, id] of ids.entries()) {
      if (signal?.aborted) {
        dropped.push({ id, reason: "aborted" });
        continue;
      }
      if (index > 0 && this.settings.requestDelayMs > 0) {
        await sleep(this.settings.requestDelayMs);
      }

      try {
        const item = await this.getItem(id, signal);
        const story = toStory(item);
        if (typeof story === "string") {
          log.warn(`Dropping story ${id}: ${story}`);
          dropped.push({ id, reason: story });
        } else {
          stories.push(story);
        }
      } catch (error) {
        log.error(`Error fetching story ${id}: ${errorMessage(error)}`);
        dropped.push({ id, reason: errorMessage(error) });
      }
    }

    log.info(`Fetched ${stories.length} stories (${dropped.length} dropped)`);
    return { stories, dropped };
  }
}

/** A Story, or the reason the item cannot be used. */
export function toStory(item: HNItem | null): Story | string {
  if (!item) return "item not found";
  if (item.deleted) return "item deleted";
  if (item.dead) return "item dead";
  if (!item.title) return "item has no title";

  return {
    id: item.id,
    title: item.title,
    url: item.url,
    text: item.text,
    score: item.score,
    comments: item.descendants,
    by: item.by,
    time: item.time,
  };
}
