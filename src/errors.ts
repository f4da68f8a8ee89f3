/**
 * errors.ts - Error types for the Weaviate access layer
 *
 * Most failures in this layer are absorbed by a fallback path and only
 * logged. The classes here are for the few that reach a caller: bad
 * configuration and a transport that exhausted its retry budget.
 */

/** Invalid configuration detected while loading settings. */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * An HTTP request that could not be completed.
 *
 * `transient` is true when the underlying failure was a connection-level
 * fault (reset, timeout, TLS/EOF anomaly) that the retry loop would retry.
 */
export class TransportError extends Error {
  readonly url: string;
  readonly transient: boolean;
  readonly attempts: number;

  constructor(
    message: string,
    options: { url: string; transient: boolean; attempts: number; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.url = options.url;
    this.transient = options.transient;
    this.attempts = options.attempts;
  }
}

/**
 * Human-readable message for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Error code carried by Node and undici errors (ECONNRESET, UND_ERR_SOCKET, ...).
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const code = error.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
