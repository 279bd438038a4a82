/**
 * ucrt-stage Engine -- Structured Logger
 *
 * Wraps pino for structured logging. Every engine module logs through here.
 *
 * Silent by default so the CLI's own output stays clean; verbose runs send
 * structured logs to stderr, leaving stdout to the tools being driven.
 *
 * NOTE: pino.destination() instead of transports, since transports spawn
 * worker_threads that outlive a short build step.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** Logger name attached to every line */
  name?: string;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
  name: "ucrt-stage",
};

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "debug",
  "info",
  "warn",
  "error",
];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(options: Partial<LoggerOptions> = {}): Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      name: opts.name,
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;
