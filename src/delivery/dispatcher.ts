import type { ResolvedConfig } from "../config/index.js";
import type { DigestEntry } from "../digest/index.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../lib/logger.js";
import { withRetry } from "../lib/retry.js";
import { MailChannel, type MailTransport } from "./mail.js";
import type { DeliveryChannel, DeliveryResult, DeliveryStatus, OutboundMessage } from "./types.js";
import { WebhookChannel } from "./webhook.js";

const log = createLogger("delivery");

export interface ChannelFactoryOptions {
  mailTransport?: MailTransport;
  now?: () => Date;
}

/**
 * Channels for every enabled delivery method. Channels whose credentials
 * did not resolve are absent from `config.channels` and never built.
 */
export function createChannels(config: ResolvedConfig, options: ChannelFactoryOptions = {}): DeliveryChannel[] {
  const channels: DeliveryChannel[] = [];
  for (const kind of config.channels) {
    if (kind === "email" && config.mail) {
      channels.push(new MailChannel(config.mail, { transport: options.mailTransport, now: options.now }));
    } else if (kind === "slack" && config.webhook) {
      channels.push(new WebhookChannel(config.webhook, { now: options.now }));
    }
  }
  return channels;
}

export function channelStatus(sent: number, total: number): DeliveryStatus {
  if (total > 0 && sent === total) return "success";
  return sent === 0 ? "failed" : "partial";
}

/**
 * Format and send one channel's messages. Every sub-message is attempted
 * even when an earlier one failed; the result records how many made it.
 * Never throws.
 */
export async function deliver(
  channel: DeliveryChannel,
  entries: readonly DigestEntry[],
  signal?: AbortSignal
): Promise<DeliveryResult> {
  const result: DeliveryResult = {
    channel: channel.name,
    itemsAttempted: entries.length,
    itemsDelivered: 0,
    messagesSent: 0,
    messagesTotal: 0,
    status: "failed",
  };

  let messages: OutboundMessage[];
  try {
    messages = channel.format(entries);
  } catch (error) {
    log.error(`${channel.name}: could not format digest: ${errorMessage(error)}`);
    result.error = `format failed: ${errorMessage(error)}`;
    return result;
  }

  result.messagesTotal = messages.length;
  const errors: string[] = [];

  for (const [index, message] of messages.entries()) {
    const label = `${channel.name} message ${index + 1}/${messages.length}`;

    if (signal?.aborted) {
      errors.push(`${label}: not sent, run aborted`);
      continue;
    }

    try {
      await withRetry(() => channel.send(message, signal), {
        attempts: channel.retry.retries + 1,
        baseDelayMs: channel.retry.baseDelayMs,
        signal,
        onRetry: (error, attempt, delayMs) =>
          log.warn(`${label} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${errorMessage(error)}`),
      });
      result.messagesSent++;
      result.itemsDelivered += message.entries.length;
    } catch (error) {
      log.error(`${label} failed: ${errorMessage(error)}`);
      errors.push(`${label}: ${errorMessage(error)}`);
    }
  }

  result.status = channelStatus(result.messagesSent, result.messagesTotal);
  if (errors.length > 0) result.error = errors.join("; ");

  log.info(
    `${channel.name}: ${result.status} (${result.itemsDelivered}/${result.itemsAttempted} stories, ${result.messagesSent}/${result.messagesTotal} messages)`
  );
  return result;
}

/**
 * Deliver to every channel. Channels are independent: a failure in one
 * never stops or undoes another.
 */
export async function dispatch(
  channels: readonly DeliveryChannel[],
  entries: readonly DigestEntry[],
  options: { parallel?: boolean; signal?: AbortSignal } = {}
): Promise<DeliveryResult[]> {
  if (options.parallel) {
    return Promise.all(channels.map((channel) => deliver(channel, entries, options.signal)));
  }

  const results: DeliveryResult[] = [];
  for (const channel of channels) {
    results.push(await deliver(channel, entries, options.signal));
  }
  return results;
}
