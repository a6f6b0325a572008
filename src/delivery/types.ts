import type { DigestEntry } from "../digest/index.js";

/** One unit a channel sends atomically, and the entries it carries. */
export interface OutboundMessage<P = unknown> {
  payload: P;
  entries: readonly DigestEntry[];
}

export interface RetryPolicy {
  /** Extra attempts after the first, for transient failures only */
  retries: number;
  baseDelayMs: number;
}

export interface DeliveryChannel<P = unknown> {
  readonly name: string;
  readonly retry: RetryPolicy;
  format(entries: readonly DigestEntry[]): OutboundMessage<P>[];
  send(message: OutboundMessage<P>, signal?: AbortSignal): Promise<void>;
}

export type DeliveryStatus = "success" | "partial" | "failed";

export interface DeliveryResult {
  channel: string;
  itemsAttempted: number;
  itemsDelivered: number;
  messagesSent: number;
  messagesTotal: number;
  status: DeliveryStatus;
  error?: string;
}
