/**
 * Logging with pino.
 *
 * The root logger writes JSON lines to stderr. A session may attach an
 * EventSink that receives the same lines so they can be donated later.
 */
import pino from "pino";
import type { LevelWithSilent, Logger, StreamEntry } from "pino";

export type LogLevel = LevelWithSilent;
export type { Logger };

/** Append-only in-memory buffer of log lines. */
export class EventSink {
  private buffer: string[] = [];

  write(chunk: string): void {
    for (const line of chunk.split("\n")) {
      if (line.length > 0) this.buffer.push(line);
    }
  }

  lines(): string[] {
    return [...this.buffer];
  }

  get size(): number {
    return this.buffer.length;
  }
}

// One stderr destination for every logger in the process
const stderr = pino.destination(2);

export interface LoggerOptions {
  level?: LogLevel;
  sink?: EventSink;
  name?: string;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? "info";
  const base = {
    name: opts.name ?? "ddp-donate",
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  if (level === "silent") return pino(base);

  const streams: StreamEntry[] = [{ level, stream: stderr }];
  if (opts.sink) streams.push({ level, stream: opts.sink });
  return pino(base, pino.multistream(streams));
}

/** Render an unknown thrown value for a log line. */
export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL;

/** Library-wide logger for code that runs outside a session. */
export const logger = createLogger({
  level: isLogLevel(envLevel) ? envLevel : "info",
});
