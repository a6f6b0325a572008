import { existsSync, readFileSync } from "fs";
import YAML from "yaml";
import { ConfigurationError } from "../errors.js";
import { createLogger } from "../lib/logger.js";
import { FileConfigSchema, type FileConfig } from "./schema.js";

const log = createLogger("config");

/** Places where older config files kept credentials in plaintext. */
const PLAINTEXT_SECRET_PATHS: string[][] = [
  ["summarizer", "gemini_api_key"],
  ["summarizer", "openai_api_key"],
  ["summarizer", "anthropic_api_key"],
  ["delivery", "email", "username"],
  ["delivery", "email", "password"],
  ["delivery", "slack", "webhook_url"],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function lookup(root: Record<string, unknown>, path: string[]): unknown {
  let current: unknown = root;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function parseConfig(raw: unknown, source = "config"): FileConfig {
  const input = raw ?? {};
  if (!isRecord(input)) {
    throw new ConfigurationError(`${source}: expected a mapping at the top level`);
  }

  for (const path of PLAINTEXT_SECRET_PATHS) {
    if (lookup(input, path) !== undefined) {
      log.warn(
        `${source}: ignoring ${path.join(".")}; secrets are read from the secret store or environment only`
      );
    }
  }

  const result = FileConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`${source}: invalid configuration (${issues})`);
  }
  return result.data;
}

/**
 * Load and validate a YAML config file. A missing file yields the defaults.
 */
export function loadConfigFile(filePath: string): FileConfig {
  if (!existsSync(filePath)) {
    log.warn(`${filePath} not found, using default configuration`);
    return parseConfig({}, filePath);
  }

  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Could not parse ${filePath}`, { cause: err });
  }

  const config = parseConfig(raw, filePath);
  log.info(`Loaded ${filePath}`);
  return config;
}
