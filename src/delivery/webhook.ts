import type { WebhookSettings } from "../config/index.js";
import { digestTitle, hnItemUrl, isDegraded, storyUrl, summaryOrPlaceholder, type DigestEntry } from "../digest/index.js";
import { DeliveryError, isTransientStatus } from "../errors.js";
import { createLogger } from "../lib/logger.js";
import { timeoutSignal } from "../lib/retry.js";
import type { DeliveryChannel, OutboundMessage, RetryPolicy } from "./types.js";

const log = createLogger("webhook");

/** Slack caps section text at 3000 characters and a message at 50 blocks. */
export const MAX_SECTION_TEXT = 3000;
export const MAX_BLOCKS = 50;
const MAX_HEADER_TEXT = 150;

export type SlackBlock =
  | { type: "header"; text: { type: "plain_text"; text: string; emoji: boolean } }
  | { type: "section"; text: { type: "mrkdwn"; text: string } }
  | { type: "context"; elements: Array<{ type: "mrkdwn"; text: string }> }
  | { type: "divider" };

export interface SlackPayload {
  channel?: string;
  username: string;
  icon_emoji: string;
  /** Notification fallback */
  text: string;
  blocks: SlackBlock[];
}

/** Slack's mrkdwn control characters */
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function splitText(text: string, size: number): string[] {
  if (text.length <= size) return [text];
  const parts: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    parts.push(text.slice(i, i + size));
  }
  return parts;
}

function section(text: string): SlackBlock {
  return { type: "section", text: { type: "mrkdwn", text } };
}

export function entryBlocks(entry: DigestEntry): SlackBlock[] {
  const { story } = entry;
  const blocks: SlackBlock[] = [
    section(`*${entry.rank}. <${storyUrl(story)}|${escapeMrkdwn(story.title)}>*`),
    {
      type: "context",
      elements: [
        {
          type: "mrkdwn",
          text: `${story.score ?? 0} points | <${hnItemUrl(story.id)}|${story.comments ?? 0} comments>`,
        },
      ],
    },
  ];

  if (isDegraded(entry)) {
    blocks.push(section(`_${escapeMrkdwn(summaryOrPlaceholder(entry))}_`));
  } else {
    for (const part of splitText(escapeMrkdwn(entry.summary.text), MAX_SECTION_TEXT)) {
      blocks.push(section(part));
    }
  }

  blocks.push({ type: "divider" });
  return blocks;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class WebhookChannel implements DeliveryChannel<SlackPayload> {
  readonly name = "slack";
  readonly retry: RetryPolicy;
  private readonly now: () => Date;

  constructor(
    private readonly settings: WebhookSettings,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.retry = { retries: settings.retries, baseDelayMs: settings.retryDelayMs };
  }

  /**
   * One message per `maxItemsPerMessage` entries. A group whose blocks
   * would exceed Slack's limit is halved until it fits.
   */
  format(entries: readonly DigestEntry[]): OutboundMessage<SlackPayload>[] {
    const groups = chunk(entries, this.settings.maxItemsPerMessage).flatMap((group) => this.fit(group));
    const title = digestTitle(this.now());

    return groups.map((group, index) => {
      const header = groups.length > 1 ? `${title} (${index + 1}/${groups.length})` : title;
      const blocks: SlackBlock[] = [
        { type: "header", text: { type: "plain_text", text: header.slice(0, MAX_HEADER_TEXT), emoji: true } },
        { type: "divider" },
        ...group.flatMap(entryBlocks),
      ];

      if (blocks.length > MAX_BLOCKS) {
        log.warn(`Message ${index + 1} has ${blocks.length} blocks; dropping the last ${blocks.length - MAX_BLOCKS}`);
      }

      const payload: SlackPayload = {
        username: this.settings.username,
        icon_emoji: this.settings.iconEmoji,
        text: header,
        blocks: blocks.slice(0, MAX_BLOCKS),
      };
      if (this.settings.channel) payload.channel = this.settings.channel;

      return { payload, entries: group };
    });
  }

  private fit(group: DigestEntry[]): DigestEntry[][] {
    const blockCount = 2 + group.reduce((sum, entry) => sum + entryBlocks(entry).length, 0);
    if (blockCount <= MAX_BLOCKS || group.length === 1) return [group];
    const middle = Math.ceil(group.length / 2);
    return [...this.fit(group.slice(0, middle)), ...this.fit(group.slice(middle))];
  }

  async send(message: OutboundMessage<SlackPayload>, signal?: AbortSignal): Promise<void> {
    const response = await fetch(this.settings.url.value, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(message.payload),
      signal: timeoutSignal(this.settings.timeoutMs, signal),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new DeliveryError(`Webhook responded ${response.status}: ${text.slice(0, 200)}`, {
        transient: isTransientStatus(response.status),
      });
    }

    log.info(`Posted ${message.entries.length} stories to Slack`);
  }
}
