import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterAll, describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../errors.js";
import { loadConfigFile, parseConfig } from "./loader.js";
import { MAX_SUMMARY_LENGTH } from "./schema.js";

describe("parseConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({});

    expect(config.summarizer.provider).toBe("gemini");
    expect(config.summarizer.max_length).toBe(1200);
    expect(config.delivery.method).toBe("email");
    expect(config.delivery.email.smtp_port).toBe(587);
    expect(config.delivery.slack.max_summaries_per_message).toBe(3);
    expect(config.pipeline.top_stories).toBe(10);
    expect(config.security.secret_manager_fallback).toBe(true);
  });

  it("accepts ollama as a name for the local model provider", () => {
    expect(parseConfig({ summarizer: { provider: "Ollama" } }).summarizer.provider).toBe("local-model");
  });

  it("rejects an unknown provider", () => {
    expect(() => parseConfig({ summarizer: { provider: "cohere" } })).toThrow(ConfigurationError);
  });

  it("names the offending path when validation fails", () => {
    expect(() => parseConfig({ pipeline: { top_stories: 0 } }, "test.yaml")).toThrow(
      /^test\.yaml: invalid configuration \(pipeline\.top_stories: /
    );
  });

  it("caps the summary length", () => {
    expect(parseConfig({ summarizer: { max_length: MAX_SUMMARY_LENGTH } }).summarizer.max_length).toBe(MAX_SUMMARY_LENGTH);
    expect(() => parseConfig({ summarizer: { max_length: MAX_SUMMARY_LENGTH + 1 } })).toThrow(ConfigurationError);
  });

  it("rejects a document that is not a mapping", () => {
    expect(() => parseConfig(["a", "b"], "list.yaml")).toThrow("list.yaml: expected a mapping at the top level");
  });

  it("warns about and drops plaintext secrets", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const config = parseConfig({ delivery: { email: { password: "test-secret" } } }, "config.yaml");

    expect(config.delivery.email).not.toHaveProperty("password");
    expect(warn).toHaveBeenCalledWith(
      "[config]",
      "config.yaml: ignoring delivery.email.password; secrets are read from the secret store or environment only"
    );
  });
});

describe("loadConfigFile", () => {
  const dir = mkdtempSync(join(tmpdir(), "hn-digest-config-"));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads and validates a YAML file", () => {
    const path = join(dir, "config.yaml");
    writeFileSync(path, "pipeline:\n  top_stories: 5\ndelivery:\n  method: slack\n");

    const config = loadConfigFile(path);

    expect(config.pipeline.top_stories).toBe(5);
    expect(config.delivery.method).toBe("slack");
  });

  it("falls back to defaults when the file is missing", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(loadConfigFile(join(dir, "missing.yaml")).pipeline.top_stories).toBe(10);
  });

  it("treats an empty file as all defaults", () => {
    const path = join(dir, "empty.yaml");
    writeFileSync(path, "");
    expect(loadConfigFile(path).delivery.method).toBe("email");
  });

  it("throws a ConfigurationError on malformed YAML", () => {
    const path = join(dir, "broken.yaml");
    writeFileSync(path, "pipeline: [unclosed\n");

    expect(() => loadConfigFile(path)).toThrow(`Could not parse ${path}`);
  });
});
