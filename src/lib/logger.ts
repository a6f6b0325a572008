export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? "info";

export function parseLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const lower = value.toLowerCase();
  return lower === "debug" || lower === "info" || lower === "warn" || lower === "error"
    ? lower
    : undefined;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger with a `[scope]` prefix. Level is process-wide so that
 * `--debug` on the CLI reaches every module.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const enabled = (level: LogLevel) => LEVELS[level] >= LEVELS[threshold];

  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(prefix, message, ...details);
    },
  };
}
