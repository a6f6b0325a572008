import { parseArgs } from "node:util";
import type { ConfigOverrides } from "./config/index.js";

export const USAGE = `Usage: hn-digest [options]

Options:
  --config <path>     Configuration file (default: config.yaml)
  --top <n>           Number of top stories to include
  --delivery <list>   Comma-separated delivery methods (email, slack)
  --dry-run           Build the digest and print it without sending
  --debug             Verbose logging
  -h, --help          Show this help`;

export interface CliOptions {
  configPath: string;
  overrides: ConfigOverrides;
  debug: boolean;
  dryRun: boolean;
}

export function parseCli(argv: string[]): CliOptions | "help" {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: "string", default: "config.yaml" },
      top: { type: "string" },
      delivery: { type: "string" },
      "dry-run": { type: "boolean", default: false },
      debug: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) return "help";

  const overrides: ConfigOverrides = {};
  if (values.top !== undefined) {
    const top = Number(values.top);
    if (!Number.isInteger(top) || top < 1) {
      throw new Error(`--top must be a positive integer, got "${values.top}"`);
    }
    overrides.topStories = top;
  }
  if (values.delivery !== undefined) overrides.delivery = values.delivery;

  return {
    configPath: values.config ?? "config.yaml",
    overrides,
    debug: values.debug ?? false,
    dryRun: values["dry-run"] ?? false,
  };
}
