import type { Logger, LogLevel, LogMeta } from "../ports/logger";
import { systemClock, type Clock } from "../ports/clock";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const v = raw?.trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  return fallback;
}

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  scope?: string;
  clock?: Clock;
};

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly clock: Clock;

  constructor(private readonly options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.clock = options.clock ?? systemClock;
  }

  debug(message: string, meta?: LogMeta): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write("error", message, meta);
  }

  child(scope: string): Logger {
    const parent = this.options.scope;
    return new ConsoleLogger({ ...this.options, scope: parent ? `${parent}:${scope}` : scope });
  }

  private write(level: LogLevel, message: string, meta?: LogMeta) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const scope = this.options.scope ? ` [${this.options.scope}]` : "";
    const line = `[${this.clock.now().toISOString()}] ${level.toUpperCase()}${scope} ${message}`;
    const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;

    if (meta && Object.keys(meta).length > 0) sink(line, meta);
    else sink(line);
  }
}
