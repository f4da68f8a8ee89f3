#!/usr/bin/env node
/**
 * cli.ts - Entry point for the weaviate-bridge command
 *
 * Wires the commander program to a real store: configuration from the
 * environment with --url on top, logs on stderr, command output on stdout.
 */

// Initialize OpenTelemetry tracing before any other imports
import "./tracing";

import { readFile } from "node:fs/promises";
import { buildProgram } from "./cli/program";
import { describeError } from "./errors";
import { createLogger, type LogLevel } from "./logger";
import { WeaviateStore } from "./store";
import { loadConfig } from "./config";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

async function main(): Promise<void> {
  const program = buildProgram({
    openStore: async (options) => {
      const overrides = {
        url: options.url,
        logLevel: isLogLevel(options.logLevel) ? options.logLevel : undefined,
      };
      const logger = createLogger({ level: loadConfig(overrides).logLevel, stderr: true });
      return WeaviateStore.connect({ config: overrides, logger });
    },
    readFile: (path) => readFile(path, "utf-8"),
    io: { out: (text) => console.log(text) },
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
