// =============================================================================
// Logging — Structured host and plugin event logging
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  pluginId?: string;
  data?: Record<string, unknown>;
}

/** Sink for structured log entries. Every host component takes one. */
export type Logger = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  /** Entries below this level are dropped (default: "info") */
  minLevel?: LogLevel;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.minLevel ?? "info"];

  return (entry: LogEntry) => {
    if (LEVEL_ORDER[entry.level] < threshold) return;
    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
    const scope = entry.pluginId ? ` (${entry.pluginId})` : "";
    const line = `${prefix} ${entry.event}${scope}`;
    // eslint-disable-next-line no-console
    const write = entry.level === "error" ? console.error : entry.level === "warn" ? console.warn : console.log;
    write(line, entry.data ?? "");
  };
}

export const silentLogger: Logger = () => {};

/** Small helper so call sites read `log(logger, "warn", "discover:skipped", { ... })`. */
export function log(
  logger: Logger,
  level: LogLevel,
  event: string,
  data?: Record<string, unknown>,
  pluginId?: string,
): void {
  logger({ timestamp: Date.now(), level, event, pluginId, data });
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.keys(LEVEL_ORDER).includes(value);
}
