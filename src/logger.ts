import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";
import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown> | null;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type Sink = (entry: LogEntry) => void;
type EchoWriter = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: Sink;
  echo?: {
    minLevel?: LogLevel;
    writer?: EchoWriter;
  };
  clock?: () => number;
  minLevel?: LogLevel;
}

const defaultClock = () => Date.now();

function isEchoSuppressed(): boolean {
  const raw = process.env.BATCH_RELAY_DISABLE_LOG_ECHO;
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return false;
  return normalized !== "0" && normalized !== "false";
}

const defaultEchoWriter: EchoWriter = (entry) => {
  if (isEchoSuppressed()) return;
  const { level, scope, message, meta } = entry;
  const prefix =
    level === "error"
      ? "⛔"
      : level === "warn"
        ? "⚠️"
        : level === "info"
          ? "ℹ️"
          : "·";
  const scopeText = scope ? `[${scope}] ` : "";
  if (meta && Object.keys(meta).length) {
    console.error(`${prefix} ${scopeText}${message}`, serializeMeta(meta));
  } else {
    console.error(`${prefix} ${scopeText}${message}`);
  }
};

function serializeMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

export class StructuredLogger implements Logger {
  private readonly sink: Sink;
  private readonly echoMinLevel?: LogLevel;
  private readonly echoWriter: EchoWriter;
  private readonly clock: () => number;
  private readonly scope?: string;
  private readonly minLevel: LogLevel;

  constructor({ scope, sink, echo, clock, minLevel }: LoggerOptions = {}) {
    this.scope = scope;
    this.sink = sink ?? (() => {});
    this.echoMinLevel = echo?.minLevel;
    this.echoWriter = echo?.writer ?? defaultEchoWriter;
    this.clock = clock ?? defaultClock;
    this.minLevel = minLevel ?? "debug";
  }

  child(scope: string): Logger {
    const childScope = this.scope ? `${this.scope}.${scope}` : scope;
    return new StructuredLogger({
      scope: childScope,
      sink: this.sink,
      echo: this.echoMinLevel
        ? { minLevel: this.echoMinLevel, writer: this.echoWriter }
        : undefined,
      clock: this.clock,
      minLevel: this.minLevel,
    });
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;
    const entry: LogEntry = {
      ts: this.clock(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.sink(entry);
    if (this.echoMinLevel && levelAtOrAbove(this.echoMinLevel, level)) {
      this.echoWriter(entry);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return levelAtOrAbove(this.minLevel, level);
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info", sink?: Sink) {
    super({ echo: { minLevel }, minLevel, sink });
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((lvl) => lvl === value);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export function levelAtOrAbove(
  desired: LogLevel,
  candidate: LogLevel,
): boolean {
  return LEVEL_ORDER[candidate] >= LEVEL_ORDER[desired];
}

/**
 * Append every entry as one JSON line. A directory target gets one file per
 * day (`relay-YYYYMMDD.log`), matching the daily logs operators already
 * rotate by hand.
 */
export function fileSink(
  target: string,
  opts: { daily?: boolean } = {},
): Sink {
  const resolve = (ts: number) => {
    if (!opts.daily) return target;
    const d = new Date(ts);
    const stamp = `${d.getFullYear()}${String(d.getMonth() + 1).padStart(2, "0")}${String(d.getDate()).padStart(2, "0")}`;
    return path.join(target, `relay-${stamp}.log`);
  };
  mkdirSync(opts.daily ? target : path.dirname(target), { recursive: true });
  return (entry) => {
    const line = JSON.stringify({
      ts: new Date(entry.ts).toISOString(),
      level: entry.level,
      scope: entry.scope ?? null,
      message: entry.message,
      meta: entry.meta ?? undefined,
    });
    try {
      appendFileSync(resolve(entry.ts), line + "\n");
    } catch (err) {
      // write failures go to stderr; the run carries on
      console.error("log sink write failed", err);
    }
  };
}
