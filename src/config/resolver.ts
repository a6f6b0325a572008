import { errorMessage, MissingConfigError } from "../errors.js";
import { createLogger } from "../lib/logger.js";
import { loadConfigFile } from "./loader.js";
import type { FileConfig, ProviderName } from "./schema.js";
import { GcpSecretStore, type SecretStore } from "./secrets.js";

const log = createLogger("config");

export type ValueSource = "secret-store" | "environment" | "file-default";

export interface ResolvedValue {
  value: string;
  source: ValueSource;
}

export type SettingKey =
  | "gemini-api-key"
  | "openai-api-key"
  | "anthropic-api-key"
  | "ollama-base-url"
  | "email-username"
  | "email-password"
  | "email-sender"
  | "email-recipients"
  | "slack-webhook-url"
  | "slack-channel";

interface SettingDef {
  secret: boolean;
  /** Where a non-secret value lives in config.yaml */
  file?: (config: FileConfig) => string | undefined;
}

const SETTINGS: Record<SettingKey, SettingDef> = {
  "gemini-api-key": { secret: true },
  "openai-api-key": { secret: true },
  "anthropic-api-key": { secret: true },
  "ollama-base-url": { secret: false, file: (c) => c.summarizer.ollama_base_url },
  "email-username": { secret: true },
  "email-password": { secret: true },
  "email-sender": { secret: false, file: (c) => c.delivery.email.sender },
  "email-recipients": {
    secret: false,
    file: (c) => {
      const recipients = c.delivery.email.recipients;
      return Array.isArray(recipients) ? recipients.join(",") : recipients;
    },
  },
  "slack-webhook-url": { secret: true },
  "slack-channel": { secret: false, file: (c) => c.delivery.slack.channel },
};

/** `email-password` -> `EMAIL_PASSWORD` */
export function envName(key: SettingKey): string {
  return key.toUpperCase().replace(/-/g, "_");
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export interface ResolverOptions {
  file: FileConfig;
  env: Record<string, string | undefined>;
  store?: SecretStore;
}

/**
 * Walks the resolution chain for one setting: secret store, then
 * environment, then config file (non-secret settings only). Empty strings
 * count as unresolved at every step.
 */
export class ConfigResolver {
  private readonly resolvedSources = new Map<SettingKey, ValueSource>();

  constructor(private readonly options: ResolverOptions) {}

  get sources(): ReadonlyMap<SettingKey, ValueSource> {
    return this.resolvedSources;
  }

  async resolve(key: SettingKey, options: { required: true }): Promise<ResolvedValue>;
  async resolve(key: SettingKey, options?: { required?: boolean }): Promise<ResolvedValue | undefined>;
  async resolve(key: SettingKey, options: { required?: boolean } = {}): Promise<ResolvedValue | undefined> {
    const { file, env, store } = this.options;
    const setting = SETTINGS[key];
    const tried: string[] = [];

    if (store) {
      tried.push(store.name);
      try {
        const value = nonEmpty(await store.get(key));
        if (value !== undefined) return this.hit(key, value, "secret-store");
        log.debug(`${key}: not found in ${store.name}`);
      } catch (error) {
        if (!file.security.secret_manager_fallback) {
          log.error(`${key}: ${store.name} lookup failed and fallback is disabled: ${errorMessage(error)}`);
          return this.miss(key, tried, options.required);
        }
        log.warn(`${key}: ${store.name} lookup failed, falling back: ${errorMessage(error)}`);
      }
    }

    if (file.security.use_environment_variables) {
      const name = envName(key);
      tried.push(`$${name}`);
      const value = nonEmpty(env[name]);
      if (value !== undefined) return this.hit(key, value, "environment");
      log.debug(`${key}: $${name} not set`);
    }

    if (!setting.secret && setting.file) {
      tried.push("config file");
      const value = nonEmpty(setting.file(file));
      if (value !== undefined) return this.hit(key, value, "file-default");
    }

    return this.miss(key, tried, options.required);
  }

  private hit(key: SettingKey, value: string, source: ValueSource): ResolvedValue {
    log.debug(`${key}: resolved from ${source}`);
    this.resolvedSources.set(key, source);
    return { value, source };
  }

  private miss(key: SettingKey, tried: string[], required = false): undefined {
    if (required) throw new MissingConfigError(key, tried);
    log.debug(`${key}: not set`);
    return undefined;
  }
}

// ============ Resolved configuration ============

export type ChannelKind = "email" | "slack";

export interface SummarizerSettings {
  provider: ProviderName;
  model: string;
  apiKey?: ResolvedValue;
  baseUrl?: string;
  maxTokens: number;
  maxLength: number;
  language: string;
  temperature: number;
  timeoutMs: number;
}

export interface MailSettings {
  host: string;
  port: number;
  username: ResolvedValue;
  password: ResolvedValue;
  sender: string;
  recipients: string[];
  subjectTemplate: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
}

export interface WebhookSettings {
  url: ResolvedValue;
  channel?: string;
  username: string;
  iconEmoji: string;
  maxItemsPerMessage: number;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
}

export interface FetcherSettings {
  baseUrl: string;
  timeoutMs: number;
  attempts: number;
  baseDelayMs: number;
  requestDelayMs: number;
}

export interface ExtractorSettings {
  userAgent: string;
  minChars: number;
  maxChars: number;
  timeoutMs: number;
  attempts: number;
  baseDelayMs: number;
}

export interface PipelineSettings {
  topStories: number;
  concurrency: number;
  summarizeRetries: number;
  parallelDelivery: boolean;
  retryDelayMs: number;
}

export interface DisabledChannel {
  channel: ChannelKind;
  reason: string;
}

export interface ResolvedConfig {
  summarizer: SummarizerSettings;
  /** Channels named in delivery.method, deduplicated, in the order given */
  requestedChannels: readonly ChannelKind[];
  /** Requested channels whose credentials all resolved */
  channels: readonly ChannelKind[];
  disabledChannels: readonly DisabledChannel[];
  mail?: MailSettings;
  webhook?: WebhookSettings;
  pipeline: PipelineSettings;
  fetcher: FetcherSettings;
  extractor: ExtractorSettings;
  logLevel: FileConfig["logging"]["level"];
  sources: Readonly<Partial<Record<SettingKey, ValueSource>>>;
}

export interface ConfigOverrides {
  /** Replaces delivery.method */
  delivery?: string;
  topStories?: number;
}

export interface ResolveOptions {
  configPath?: string;
  /** Already-parsed configuration; skips reading configPath */
  file?: FileConfig;
  overrides?: ConfigOverrides;
  env?: Record<string, string | undefined>;
  /** Used in place of Google Secret Manager when use_secret_manager is on */
  secretStore?: SecretStore;
}

const CHANNEL_ALIASES: Record<string, ChannelKind> = {
  email: "email",
  mail: "email",
  slack: "slack",
  webhook: "slack",
};

export function parseDeliveryMethods(method: string): ChannelKind[] {
  const kinds: ChannelKind[] = [];
  for (const raw of method.split(",")) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    const kind = CHANNEL_ALIASES[name];
    if (!kind) {
      log.warn(`Unsupported delivery method: ${name}`);
      continue;
    }
    if (!kinds.includes(kind)) kinds.push(kind);
  }
  return kinds;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function createSecretStore(
  file: FileConfig,
  env: Record<string, string | undefined>,
  injected: SecretStore | undefined
): SecretStore | undefined {
  if (!file.security.use_secret_manager) return undefined;
  if (injected) return injected;

  const project =
    file.security.secret_manager_project || env.GCP_PROJECT || env.GOOGLE_CLOUD_PROJECT;
  if (!project) {
    log.error(
      "use_secret_manager is on but no project is set (security.secret_manager_project or GCP_PROJECT); skipping the secret store"
    );
    return undefined;
  }
  return new GcpSecretStore(project, file.timeouts.fetch_ms);
}

async function resolveSummarizer(
  resolver: ConfigResolver,
  file: FileConfig
): Promise<SummarizerSettings> {
  const s = file.summarizer;
  const base = {
    provider: s.provider,
    maxTokens: s.max_tokens,
    maxLength: s.max_length,
    language: s.language,
    temperature: s.temperature,
    timeoutMs: file.timeouts.summarize_ms,
  };

  switch (s.provider) {
    case "gemini":
      return { ...base, model: s.gemini_model, apiKey: await resolver.resolve("gemini-api-key", { required: true }) };
    case "openai":
      return { ...base, model: s.openai_model, apiKey: await resolver.resolve("openai-api-key", { required: true }) };
    case "anthropic":
      return { ...base, model: s.anthropic_model, apiKey: await resolver.resolve("anthropic-api-key", { required: true }) };
    case "local-model": {
      const baseUrl = await resolver.resolve("ollama-base-url");
      return { ...base, model: s.local_model, baseUrl: baseUrl?.value ?? "http://localhost:11434" };
    }
  }
}

async function resolveMail(resolver: ConfigResolver, file: FileConfig): Promise<MailSettings> {
  const email = file.delivery.email;
  const username = await resolver.resolve("email-username", { required: true });
  const password = await resolver.resolve("email-password", { required: true });
  const recipientList = await resolver.resolve("email-recipients", { required: true });
  const recipients = splitList(recipientList.value);
  if (recipients.length === 0) {
    throw new MissingConfigError("email-recipients", [recipientList.source]);
  }
  const sender = await resolver.resolve("email-sender");

  return {
    host: email.smtp_server,
    port: email.smtp_port,
    username,
    password,
    sender: sender?.value ?? username.value,
    recipients,
    subjectTemplate: email.subject_template,
    timeoutMs: file.timeouts.deliver_ms,
    retries: file.retries.delivery_retries,
    retryDelayMs: file.retries.base_delay_ms,
  };
}

async function resolveWebhook(resolver: ConfigResolver, file: FileConfig): Promise<WebhookSettings> {
  const slack = file.delivery.slack;
  const url = await resolver.resolve("slack-webhook-url", { required: true });
  const channel = await resolver.resolve("slack-channel");

  return {
    url,
    channel: channel?.value,
    username: slack.username,
    iconEmoji: slack.icon_emoji,
    maxItemsPerMessage: slack.max_summaries_per_message,
    timeoutMs: file.timeouts.deliver_ms,
    retries: file.retries.delivery_retries,
    retryDelayMs: file.retries.base_delay_ms,
  };
}

/**
 * Build the run's configuration once. Throws ConfigurationError when a core
 * setting is missing; channels with missing credentials are disabled and
 * listed in `disabledChannels` instead.
 */
export async function resolveConfig(options: ResolveOptions = {}): Promise<ResolvedConfig> {
  const env = options.env ?? process.env;
  const file = options.file ?? loadConfigFile(options.configPath ?? "config.yaml");
  const overrides = options.overrides ?? {};

  const store = createSecretStore(file, env, options.secretStore);
  const resolver = new ConfigResolver({ file, env, store });

  const summarizer = await resolveSummarizer(resolver, file);

  const requestedChannels = parseDeliveryMethods(overrides.delivery ?? file.delivery.method);
  const channels: ChannelKind[] = [];
  const disabledChannels: DisabledChannel[] = [];
  let mail: MailSettings | undefined;
  let webhook: WebhookSettings | undefined;

  for (const kind of requestedChannels) {
    try {
      if (kind === "email") {
        mail = await resolveMail(resolver, file);
      } else {
        webhook = await resolveWebhook(resolver, file);
      }
      channels.push(kind);
    } catch (error) {
      if (!(error instanceof MissingConfigError)) throw error;
      log.warn(`Channel "${kind}" disabled: ${error.message}`);
      disabledChannels.push({ channel: kind, reason: error.message });
    }
  }

  const sources: Partial<Record<SettingKey, ValueSource>> = {};
  for (const [key, source] of resolver.sources) sources[key] = source;

  const config: ResolvedConfig = {
    summarizer,
    requestedChannels,
    channels,
    disabledChannels,
    mail,
    webhook,
    pipeline: {
      topStories: overrides.topStories ?? file.pipeline.top_stories,
      concurrency: file.pipeline.concurrency,
      summarizeRetries: file.pipeline.summarize_retries,
      parallelDelivery: file.pipeline.parallel_delivery,
      retryDelayMs: file.retries.base_delay_ms,
    },
    fetcher: {
      baseUrl: file.hacker_news.base_url,
      timeoutMs: file.timeouts.fetch_ms,
      attempts: file.retries.fetch_attempts,
      baseDelayMs: file.retries.base_delay_ms,
      requestDelayMs: file.hacker_news.request_delay_ms,
    },
    extractor: {
      userAgent: file.extractor.user_agent,
      minChars: file.extractor.min_chars,
      maxChars: file.extractor.max_chars,
      timeoutMs: file.timeouts.extract_ms,
      attempts: file.retries.extract_attempts,
      baseDelayMs: file.retries.base_delay_ms,
    },
    logLevel: file.logging.level,
    sources,
  };

  log.info(
    `Provider: ${summarizer.provider} (${summarizer.model}); channels: ${channels.join(", ") || "none"}`
  );
  return deepFreeze(config);
}
