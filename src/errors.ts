export type ErrorKind =
  | "configuration"
  | "fetch"
  | "extraction"
  | "summarization"
  | "delivery";

export abstract class DigestError extends Error {
  abstract readonly kind: ErrorKind;
  /** True when retrying the same call may succeed (network, 429, 5xx, timeout). */
  readonly transient: boolean;

  constructor(message: string, options: { transient?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.transient = options.transient ?? false;
  }
}

export class ConfigurationError extends DigestError {
  readonly kind = "configuration";
}

export class MissingConfigError extends ConfigurationError {
  constructor(
    readonly key: string,
    readonly tried: string[]
  ) {
    super(`Missing required setting "${key}" (tried: ${tried.join(", ") || "nothing"})`);
  }
}

export class FetchError extends DigestError {
  readonly kind = "fetch";
}

export class ExtractionError extends DigestError {
  readonly kind = "extraction";
}

export class SummarizationError extends DigestError {
  readonly kind = "summarization";
}

export class DeliveryError extends DigestError {
  readonly kind = "delivery";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP statuses worth retrying. Everything else in the 4xx range is a
 * permanent rejection (bad credentials, bad request, gone).
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Best-effort classification of errors thrown by fetch, SDK clients and
 * nodemailer. Typed DigestErrors carry their own flag.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof DigestError) return error.transient;
  if (!(error instanceof Error)) return false;

  if (error.name === "TimeoutError") return true;

  if (error.name === "APIConnectionError" || error.name === "APIConnectionTimeoutError") {
    return true;
  }

  // SMTP reply codes: 4xx is "try again later", 5xx is final
  const smtpCode = readNumber(error, "responseCode");
  if (smtpCode !== undefined) return smtpCode >= 400 && smtpCode < 500;

  const status = readNumber(error, "status");
  if (status !== undefined) return isTransientStatus(status);

  const code = readString(error, "code");
  if (code && ["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "ESOCKET", "ECONNECTION"].includes(code)) {
    return true;
  }

  // undici wraps network failures as TypeError("fetch failed")
  return error instanceof TypeError && error.message === "fetch failed";
}

function readNumber(error: Error, key: string): number | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === "number" ? value : undefined;
}

function readString(error: Error, key: string): string | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === "string" ? value : undefined;
}
