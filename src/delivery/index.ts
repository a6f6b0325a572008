export { createChannels, channelStatus, deliver, dispatch, type ChannelFactoryOptions } from "./dispatcher.js";
export { MailChannel, createSmtpTransport, type MailTransport, type MailPayload } from "./mail.js";
export {
  WebhookChannel,
  entryBlocks,
  escapeMrkdwn,
  splitText,
  MAX_BLOCKS,
  MAX_SECTION_TEXT,
  type SlackBlock,
  type SlackPayload,
} from "./webhook.js";
export type {
  DeliveryChannel,
  DeliveryResult,
  DeliveryStatus,
  OutboundMessage,
  RetryPolicy,
} from "./types.js";
