/**
 * logger.ts - Structured logging
 *
 * Every component takes a pino logger and binds its own `component` name
 * via child(). Structured context (collection, url, status) goes in the
 * merge object, the message stays short:
 *
 *   log.warn({ collection: "Docs", status: 405 }, "v1 create not allowed");
 *
 * The CLI writes logs to stderr so stdout stays clean for command output.
 */

import pino, { type Logger } from "pino";

export type { Logger };

export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export interface LoggerOptions {
  /** Minimum level to emit (default: "info") */
  level?: LogLevel;
  /** Write to stderr instead of stdout */
  stderr?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const config: pino.LoggerOptions = {
    name: "weaviate-bridge",
    level: options.level ?? "info",
  };
  return options.stderr ? pino(config, pino.destination(2)) : pino(config);
}

/** Logger that drops everything; the default when a caller passes none. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
