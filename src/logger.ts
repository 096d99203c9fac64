// src/logger.ts
import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const PREFIX: Record<LogLevel, string> = {
  debug: "·",
  info: "ℹ️",
  warn: "⚠️",
  error: "⛔",
};

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface Logger {
  child(scope: string): Logger;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  scope?: string;
  /** Receives every entry at or above minLevel. */
  sink?: (entry: LogEntry) => void;
  /** Also print entries to stderr. */
  echo?: boolean;
  minLevel?: LogLevel;
}

// LAUNCHER_CACHE_DISABLE_LOG_ECHO=1 silences stderr, e.g. under test
function echoDisabled(): boolean {
  const raw = process.env.LAUNCHER_CACHE_DISABLE_LOG_ECHO?.trim().toLowerCase();
  return !!raw && raw !== "0" && raw !== "false";
}

function formatMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

function echo({ level, scope, message, meta }: LogEntry): void {
  const line = `${PREFIX[level]} ${scope ? `[${scope}] ` : ""}${message}`;
  if (meta) console.error(line, formatMeta(meta));
  else console.error(line);
}

export class StructuredLogger implements Logger {
  constructor(private readonly opts: LoggerOptions = {}) {}

  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new StructuredLogger({
      ...this.opts,
      scope: parent ? `${parent}.${scope}` : scope,
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }

  private write(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
  ): void {
    if (RANK[level] < RANK[this.opts.minLevel ?? "debug"]) return;
    const entry: LogEntry = {
      ts: Date.now(),
      level,
      scope: this.opts.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.opts.sink?.(entry);
    if (this.opts.echo && !echoDisabled()) echo(entry);
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({ echo: true, minLevel });
  }
}

/** Keeps every entry, child loggers included; used to assert on output. */
export class MemoryLogger extends StructuredLogger {
  readonly entries: LogEntry[];

  constructor(entries: LogEntry[] = []) {
    super({ sink: (entry) => entries.push(entry) });
    this.entries = entries;
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((e) => level == null || e.level === level)
      .map((e) => e.message);
  }
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((lvl) => lvl === normalized) ?? fallback;
}
