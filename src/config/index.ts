export {
  ConfigResolver,
  resolveConfig,
  parseDeliveryMethods,
  envName,
  type ResolvedConfig,
  type ResolvedValue,
  type ValueSource,
  type SettingKey,
  type ChannelKind,
  type SummarizerSettings,
  type MailSettings,
  type WebhookSettings,
  type FetcherSettings,
  type ExtractorSettings,
  type PipelineSettings,
  type DisabledChannel,
  type ConfigOverrides,
  type ResolveOptions,
} from "./resolver.js";
export { loadConfigFile, parseConfig } from "./loader.js";
export { FileConfigSchema, MAX_SUMMARY_LENGTH, PROVIDERS, type FileConfig, type ProviderName } from "./schema.js";
export { GcpSecretStore, type SecretStore } from "./secrets.js";
