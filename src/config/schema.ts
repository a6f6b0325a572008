/**
 * Schema for config.yaml. Every field has a default so a missing or partial
 * file still yields a complete configuration. Secrets (API keys, SMTP
 * password, webhook URL) are not part of it: they come from the secret
 * store or the environment.
 */

import { z } from "zod";

export const MAX_SUMMARY_LENGTH = 20000;

export const PROVIDERS = ["gemini", "openai", "anthropic", "local-model"] as const;
export type ProviderName = (typeof PROVIDERS)[number];

const ProviderSchema = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .transform((v) => (v === "ollama" ? "local-model" : v))
  .pipe(z.enum(PROVIDERS));

const SummarizerSchema = z.object({
  /** gemini | openai | anthropic | local-model ("ollama" is accepted) */
  provider: ProviderSchema.default("gemini"),
  gemini_model: z.string().default("gemini-2.0-flash"),
  openai_model: z.string().default("gpt-4o-mini"),
  anthropic_model: z.string().default("claude-haiku-4-5"),
  local_model: z.string().default("llama3.1"),
  ollama_base_url: z.string().optional(),
  /** Output token budget passed to the provider */
  max_tokens: z.number().int().positive().default(500),
  /** Hard cap on summary characters; bounded so one summary fits a single Slack message */
  max_length: z.number().int().positive().max(MAX_SUMMARY_LENGTH).default(1200),
  language: z.string().default("English"),
  temperature: z.number().min(0).max(2).default(0.4),
});

const EmailSchema = z.object({
  smtp_server: z.string().default("smtp.gmail.com"),
  smtp_port: z.number().int().positive().default(587),
  sender: z.string().optional(),
  recipients: z.union([z.string(), z.array(z.string())]).optional(),
  subject_template: z.string().default("Hacker News Top Stories - {date}"),
});

const SlackSchema = z.object({
  channel: z.string().optional(),
  username: z.string().default("HN Digest Bot"),
  icon_emoji: z.string().default(":newspaper:"),
  max_summaries_per_message: z.number().int().positive().default(3),
});

const DeliverySchema = z.object({
  /** Comma-separated: "email", "slack" or "email,slack" */
  method: z.string().default("email"),
  email: EmailSchema.default({}),
  slack: SlackSchema.default({}),
});

const SecuritySchema = z.object({
  use_environment_variables: z.boolean().default(true),
  use_secret_manager: z.boolean().default(false),
  secret_manager_project: z.string().default(""),
  /** Fall back to the environment when the secret store is unreachable */
  secret_manager_fallback: z.boolean().default(true),
});

const PipelineSchema = z.object({
  top_stories: z.number().int().positive().default(10),
  /** Stories extracted/summarized at once */
  concurrency: z.number().int().positive().default(1),
  /** Extra summarization attempts on transient provider errors */
  summarize_retries: z.number().int().min(0).max(3).default(1),
  parallel_delivery: z.boolean().default(false),
});

const HackerNewsSchema = z.object({
  base_url: z.string().default("https://hacker-news.firebaseio.com/v0"),
  request_delay_ms: z.number().int().min(0).default(0),
});

const ExtractorSchema = z.object({
  user_agent: z.string().default("hn-digest/0.1 (+https://news.ycombinator.com)"),
  min_chars: z.number().int().min(0).default(200),
  max_chars: z.number().int().positive().default(8000),
});

const TimeoutsSchema = z.object({
  fetch_ms: z.number().int().positive().default(10000),
  extract_ms: z.number().int().positive().default(30000),
  summarize_ms: z.number().int().positive().default(60000),
  deliver_ms: z.number().int().positive().default(30000),
});

const RetriesSchema = z.object({
  fetch_attempts: z.number().int().positive().default(3),
  extract_attempts: z.number().int().positive().default(2),
  delivery_retries: z.number().int().min(0).max(3).default(2),
  base_delay_ms: z.number().int().min(0).default(500),
});

const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const FileConfigSchema = z.object({
  summarizer: SummarizerSchema.default({}),
  delivery: DeliverySchema.default({}),
  security: SecuritySchema.default({}),
  pipeline: PipelineSchema.default({}),
  hacker_news: HackerNewsSchema.default({}),
  extractor: ExtractorSchema.default({}),
  timeouts: TimeoutsSchema.default({}),
  retries: RetriesSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;
