import nodemailer, { type SendMailOptions } from "nodemailer";
import type { MailSettings } from "../config/index.js";
import { formatDate, renderHtml, renderText, type DigestEntry } from "../digest/index.js";
import { DeliveryError } from "../errors.js";
import { createLogger } from "../lib/logger.js";
import { withTimeout } from "../lib/retry.js";
import type { DeliveryChannel, OutboundMessage, RetryPolicy } from "./types.js";

const log = createLogger("mail");

/** The part of a nodemailer Transporter the channel uses. */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export interface MailPayload {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html: string;
}

export function createSmtpTransport(settings: MailSettings): MailTransport {
  const implicitTls = settings.port === 465;
  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: implicitTls,
    // STARTTLS is mandatory on the submission port
    requireTLS: !implicitTls,
    auth: {
      user: settings.username.value,
      pass: settings.password.value,
    },
    connectionTimeout: settings.timeoutMs,
    greetingTimeout: settings.timeoutMs,
    socketTimeout: settings.timeoutMs,
  });
}

export class MailChannel implements DeliveryChannel<MailPayload> {
  readonly name = "email";
  readonly retry: RetryPolicy;
  private readonly transport: MailTransport;
  private readonly now: () => Date;

  constructor(
    private readonly settings: MailSettings,
    options: { transport?: MailTransport; now?: () => Date } = {}
  ) {
    this.transport = options.transport ?? createSmtpTransport(settings);
    this.now = options.now ?? (() => new Date());
    this.retry = { retries: settings.retries, baseDelayMs: settings.retryDelayMs };
  }

  subject(date: Date): string {
    return this.settings.subjectTemplate.replace(/\{date\}/g, formatDate(date));
  }

  /** The whole digest goes out as one multipart message. */
  format(entries: readonly DigestEntry[]): OutboundMessage<MailPayload>[] {
    const date = this.now();
    return [
      {
        payload: {
          from: this.settings.sender,
          to: [...this.settings.recipients],
          subject: this.subject(date),
          text: renderText(entries, date),
          html: renderHtml(entries, date),
        },
        entries,
      },
    ];
  }

  async send(message: OutboundMessage<MailPayload>): Promise<void> {
    try {
      await withTimeout(
        this.transport.sendMail(message.payload),
        this.settings.timeoutMs,
        "SMTP send"
      );
    } catch (error) {
      // The timer only stops waiting: the SMTP transaction may still complete,
      // so sending again could deliver the digest twice.
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new DeliveryError(`${error.message}; not retried, the message may still arrive`, {
          transient: false,
          cause: error,
        });
      }
      throw error;
    }
    log.info(`Sent "${message.payload.subject}" to ${message.payload.to.length} recipient(s)`);
  }
}
