import { describe, expect, it } from "vitest";
import { MissingConfigError } from "../errors.js";
import { parseConfig } from "./loader.js";
import { ConfigResolver, envName, parseDeliveryMethods, resolveConfig } from "./resolver.js";
import type { SecretStore } from "./secrets.js";

class FakeStore implements SecretStore {
  readonly name = "fake-store";
  readonly lookups: string[] = [];

  constructor(
    private readonly values: Record<string, string> = {},
    private readonly failure?: Error
  ) {}

  async get(secretName: string): Promise<string | undefined> {
    this.lookups.push(secretName);
    if (this.failure) throw this.failure;
    return this.values[secretName];
  }
}

const MAIL_ENV = {
  GEMINI_API_KEY: "test-key",
  EMAIL_USERNAME: "bot@example.com",
  EMAIL_PASSWORD: "test-secret",
  EMAIL_RECIPIENTS: "a@example.com, b@example.com",
};

describe("envName", () => {
  it("derives the environment variable from the setting key", () => {
    expect(envName("slack-webhook-url")).toBe("SLACK_WEBHOOK_URL");
    expect(envName("gemini-api-key")).toBe("GEMINI_API_KEY");
  });
});

describe("ConfigResolver", () => {
  it("prefers the secret store over the environment", async () => {
    const resolver = new ConfigResolver({
      file: parseConfig({}),
      env: { GEMINI_API_KEY: "env-key" },
      store: new FakeStore({ "gemini-api-key": "store-key" }),
    });

    await expect(resolver.resolve("gemini-api-key")).resolves.toEqual({ value: "store-key", source: "secret-store" });
    expect(resolver.sources.get("gemini-api-key")).toBe("secret-store");
  });

  it("falls through an empty secret to the environment", async () => {
    const resolver = new ConfigResolver({
      file: parseConfig({}),
      env: { GEMINI_API_KEY: "env-key" },
      store: new FakeStore({ "gemini-api-key": "" }),
    });

    await expect(resolver.resolve("gemini-api-key")).resolves.toEqual({ value: "env-key", source: "environment" });
  });

  it("ignores a blank environment variable", async () => {
    const resolver = new ConfigResolver({ file: parseConfig({}), env: { GEMINI_API_KEY: "   " } });

    await expect(resolver.resolve("gemini-api-key")).resolves.toBeUndefined();
  });

  it("falls back to the environment when the store is unreachable", async () => {
    const resolver = new ConfigResolver({
      file: parseConfig({}),
      env: { OPENAI_API_KEY: "env-key" },
      store: new FakeStore({}, new Error("permission denied")),
    });

    await expect(resolver.resolve("openai-api-key")).resolves.toEqual({ value: "env-key", source: "environment" });
  });

  it("treats a store failure as missing when fallback is disabled", async () => {
    const resolver = new ConfigResolver({
      file: parseConfig({ security: { secret_manager_fallback: false } }),
      env: { OPENAI_API_KEY: "env-key" },
      store: new FakeStore({}, new Error("permission denied")),
    });

    await expect(resolver.resolve("openai-api-key")).resolves.toBeUndefined();
    await expect(resolver.resolve("openai-api-key", { required: true })).rejects.toThrow(
      'Missing required setting "openai-api-key" (tried: fake-store)'
    );
  });

  it("falls through a secret the store does not hold even when fallback is disabled", async () => {
    const resolver = new ConfigResolver({
      file: parseConfig({ security: { secret_manager_fallback: false } }),
      env: { GEMINI_API_KEY: "env-key" },
      store: new FakeStore({}),
    });

    await expect(resolver.resolve("gemini-api-key")).resolves.toEqual({ value: "env-key", source: "environment" });
  });

  it("skips the environment when use_environment_variables is off", async () => {
    const resolver = new ConfigResolver({
      file: parseConfig({
        security: { use_environment_variables: false },
        delivery: { email: { sender: "file@example.com" } },
      }),
      env: { EMAIL_SENDER: "env@example.com", EMAIL_PASSWORD: "test-secret" },
    });

    await expect(resolver.resolve("email-sender")).resolves.toEqual({
      value: "file@example.com",
      source: "file-default",
    });
    await expect(resolver.resolve("email-password")).resolves.toBeUndefined();
  });

  it("lets the environment override a value from the file", async () => {
    const resolver = new ConfigResolver({
      file: parseConfig({ delivery: { slack: { channel: "#file" } } }),
      env: { SLACK_CHANNEL: "#env" },
    });

    await expect(resolver.resolve("slack-channel")).resolves.toEqual({ value: "#env", source: "environment" });
  });

  it("lists every place it looked when a required value is missing", async () => {
    const resolver = new ConfigResolver({ file: parseConfig({}), env: {}, store: new FakeStore() });

    const error = await resolver.resolve("email-password", { required: true }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MissingConfigError);
    expect(error).toMatchObject({
      key: "email-password",
      tried: ["fake-store", "$EMAIL_PASSWORD"],
      message: 'Missing required setting "email-password" (tried: fake-store, $EMAIL_PASSWORD)',
    });
  });
});

describe("parseDeliveryMethods", () => {
  it("maps aliases, drops duplicates and skips unknown methods", () => {
    expect(parseDeliveryMethods("Email, webhook,mail, fax")).toEqual(["email", "slack"]);
  });

  it("returns nothing for an empty list", () => {
    expect(parseDeliveryMethods(" , ")).toEqual([]);
  });
});

describe("resolveConfig", () => {
  it("builds a frozen configuration with both channels", async () => {
    const config = await resolveConfig({
      file: parseConfig({ delivery: { method: "email,slack" } }),
      env: { ...MAIL_ENV, SLACK_WEBHOOK_URL: "https://hooks.example.com/T000/B000" },
    });

    expect(config.channels).toEqual(["email", "slack"]);
    expect(config.disabledChannels).toEqual([]);
    expect(config.summarizer).toMatchObject({ provider: "gemini", model: "gemini-2.0-flash" });
    expect(config.mail?.recipients).toEqual(["a@example.com", "b@example.com"]);
    expect(config.mail?.sender).toBe("bot@example.com");
    expect(config.webhook?.url.value).toBe("https://hooks.example.com/T000/B000");
    expect(config.sources["email-password"]).toBe("environment");
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.mail)).toBe(true);
  });

  it("reads recipients from the file when the environment has none", async () => {
    const { EMAIL_RECIPIENTS: _unused, ...env } = MAIL_ENV;
    const config = await resolveConfig({
      file: parseConfig({ delivery: { email: { recipients: ["x@example.com", "y@example.com"] } } }),
      env,
    });

    expect(config.mail?.recipients).toEqual(["x@example.com", "y@example.com"]);
    expect(config.sources["email-recipients"]).toBe("file-default");
  });

  it("disables a channel whose credential is missing", async () => {
    const config = await resolveConfig({
      file: parseConfig({ delivery: { method: "email,slack" } }),
      env: MAIL_ENV,
    });

    expect(config.requestedChannels).toEqual(["email", "slack"]);
    expect(config.channels).toEqual(["email"]);
    expect(config.webhook).toBeUndefined();
    expect(config.disabledChannels).toEqual([
      {
        channel: "slack",
        reason: 'Missing required setting "slack-webhook-url" (tried: $SLACK_WEBHOOK_URL)',
      },
    ]);
  });

  it("never takes a webhook URL from the config file", async () => {
    const config = await resolveConfig({
      file: parseConfig({
        delivery: { method: "slack", slack: { webhook_url: "https://hooks.example.com/T000/B000" } },
      }),
      env: { GEMINI_API_KEY: "test-key" },
    });

    expect(config.channels).toEqual([]);
    expect(config.disabledChannels.map((d) => d.channel)).toEqual(["slack"]);
  });

  it("fails when the summarizer credential is missing", async () => {
    await expect(resolveConfig({ file: parseConfig({}), env: {} })).rejects.toThrow(MissingConfigError);
  });

  it("needs no credential for the local model", async () => {
    const config = await resolveConfig({
      file: parseConfig({ summarizer: { provider: "ollama" }, delivery: { method: "slack" } }),
      env: { SLACK_WEBHOOK_URL: "https://hooks.example.com/T000/B000" },
    });

    expect(config.summarizer).toMatchObject({
      provider: "local-model",
      model: "llama3.1",
      baseUrl: "http://localhost:11434",
    });
    expect(config.summarizer.apiKey).toBeUndefined();
  });

  it("applies delivery and story count overrides", async () => {
    const config = await resolveConfig({
      file: parseConfig({}),
      env: { GEMINI_API_KEY: "test-key", SLACK_WEBHOOK_URL: "https://hooks.example.com/T000/B000" },
      overrides: { delivery: "slack", topStories: 3 },
    });

    expect(config.requestedChannels).toEqual(["slack"]);
    expect(config.pipeline.topStories).toBe(3);
  });

  it("reads secrets from the store when the secret manager is on", async () => {
    const store = new FakeStore({ "gemini-api-key": "store-key", "slack-webhook-url": "https://hooks.example.com/store" });
    const config = await resolveConfig({
      file: parseConfig({ delivery: { method: "slack" }, security: { use_secret_manager: true } }),
      env: { GEMINI_API_KEY: "env-key" },
      secretStore: store,
    });

    expect(config.summarizer.apiKey).toEqual({ value: "store-key", source: "secret-store" });
    expect(config.webhook?.url.value).toBe("https://hooks.example.com/store");
    expect(store.lookups).toContain("slack-webhook-url");
  });

  it("does not consult the store when the secret manager is off", async () => {
    const store = new FakeStore({ "gemini-api-key": "store-key" });
    const config = await resolveConfig({
      file: parseConfig({ delivery: { method: "" } }),
      env: { GEMINI_API_KEY: "env-key" },
      secretStore: store,
    });

    expect(config.summarizer.apiKey?.source).toBe("environment");
    expect(store.lookups).toEqual([]);
  });
});
