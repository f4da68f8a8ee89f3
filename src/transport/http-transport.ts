/**
 * http-transport.ts - Shared HTTP client for the REST surfaces
 *
 * What this file does:
 * Owns one undici Agent (the connection pool) per configuration and sends
 * every REST request through it. Each request gets the auth headers merged
 * in, is retried with exponential backoff on transient connection faults,
 * and, once the retry budget is spent, is tried one more time against the
 * canonical domain when the host is an alternate-domain cluster host.
 *
 * HTTP status codes are never errors here: a 404 or 405 is information the
 * endpoint resolver and collection manager act on. Only failures to get a
 * response at all are thrown, as TransportError.
 *
 * HTTP/2 negotiation is off by default; some managed proxies reset the
 * connection during ALPN.
 */

import { readFileSync } from "node:fs";
import { setTimeout as sleep } from "node:timers/promises";
import { Agent, request, type Dispatcher } from "undici";
import type { Logger } from "../logger";
import { TransportError, describeError, errorCode } from "../errors";
import { toCanonicalUrl } from "./domains";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE" | "HEAD";

export interface HttpResponse {
  status: number;
  /** The URL that actually answered (after any domain fallback) */
  url: string;
  text: string;
  /** Parsed JSON body, or null when the body is empty or not JSON */
  data: unknown;
}

export interface RequestOptions {
  /** JSON-serialized when not already a string */
  body?: unknown;
  headers?: Record<string, string>;
}

export interface TransportOptions {
  logger: Logger;
  apiKey?: string;
  openaiApiKey?: string;
  tlsVerify: boolean;
  /** Path to a PEM bundle of extra trusted CAs */
  caBundle?: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  http2: boolean;
  /** Total attempts per request before giving up */
  retries: number;
  retryBaseDelayMs: number;
  /** One-time retry on the canonical domain after the attempts are spent */
  domainFallback: boolean;
  /** Called after a fallback request succeeds on the canonical origin */
  onOriginPromoted?: (from: string, to: string) => void;
  /** Replaces the pooled Agent; tests pass an undici MockAgent */
  dispatcher?: Dispatcher;
}

const USER_AGENT = "weaviate-bridge/0.1 (+undici)";

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPROTO",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const TRANSIENT_MESSAGE =
  /socket hang up|other side closed|connection reset|unexpected eof|eof occurred|timed out|timeout/i;

/**
 * True for connection-level faults worth retrying: resets, refused or
 * unresolvable hosts, TLS/EOF anomalies and timeouts. Walks the `cause`
 * chain since undici wraps some socket errors.
 */
export function isTransientError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current !== undefined; depth++) {
    const code = errorCode(current);
    if (code && (TRANSIENT_CODES.has(code) || code.startsWith("ERR_SSL"))) {
      return true;
    }
    if (current instanceof Error) {
      if (TRANSIENT_MESSAGE.test(current.message)) return true;
      current = current.cause;
    } else {
      return false;
    }
  }
  return false;
}

function parseJson(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export class HttpTransport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly log: Logger;
  /** Alternate origin -> canonical origin, filled by successful fallbacks */
  private readonly promoted = new Map<string, string>();

  constructor(private readonly options: TransportOptions) {
    this.log = options.logger.child({ component: "transport" });

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connect: {
          rejectUnauthorized: options.tlsVerify,
          ca: options.caBundle ? readFileSync(options.caBundle) : undefined,
          timeout: options.connectTimeoutMs,
        },
        headersTimeout: options.readTimeoutMs,
        bodyTimeout: options.readTimeoutMs,
        allowH2: options.http2,
      });
      this.ownsDispatcher = true;
    }

    if (!options.tlsVerify) {
      this.log.warn("TLS verification disabled; use for diagnostics only");
    }
  }

  /**
   * Sends a request, retrying transient failures.
   *
   * @throws TransportError when no response could be obtained
   */
  async request(
    method: HttpMethod,
    url: string,
    options: RequestOptions = {}
  ): Promise<HttpResponse> {
    const target = this.applyPromotion(url);

    let lastError: unknown;
    let attempts = 0;
    const maxAttempts = Math.max(1, this.options.retries);

    while (attempts < maxAttempts) {
      attempts++;
      try {
        return await this.send(method, target, options);
      } catch (error) {
        lastError = error;
        const transient = isTransientError(error);
        this.log.debug(
          { method, url: target, attempt: attempts, maxAttempts, err: describeError(error) },
          "request failed"
        );
        if (!transient || attempts >= maxAttempts) break;
        await sleep(this.options.retryBaseDelayMs * 2 ** (attempts - 1));
      }
    }

    const fallback = this.options.domainFallback ? toCanonicalUrl(target) : null;
    if (fallback) {
      this.log.warn({ url: target, fallback }, "connection failed; trying canonical domain");
      try {
        const response = await this.send(method, fallback, options);
        this.promote(target, fallback);
        return response;
      } catch (error) {
        lastError = error;
        attempts++;
      }
    }

    throw new TransportError(
      `${method} ${target} failed: ${describeError(lastError)}`,
      {
        url: target,
        transient: isTransientError(lastError),
        attempts,
        cause: lastError,
      }
    );
  }

  /** Releases the connection pool. */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async send(
    method: HttpMethod,
    url: string,
    options: RequestOptions
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      accept: "application/json",
      "user-agent": USER_AGENT,
      ...this.authHeaders(),
      ...options.headers,
    };

    let body: string | undefined;
    if (options.body !== undefined) {
      body = typeof options.body === "string" ? options.body : JSON.stringify(options.body);
      headers["content-type"] = "application/json";
    }

    const response = await request(url, {
      method,
      headers,
      body,
      dispatcher: this.dispatcher,
    });
    const text = await response.body.text();

    return { status: response.statusCode, url, text, data: parseJson(text) };
  }

  private authHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.options.apiKey) {
      headers.authorization = `Bearer ${this.options.apiKey}`;
      headers["x-api-key"] = this.options.apiKey;
    }
    if (this.options.openaiApiKey) {
      headers["x-openai-api-key"] = this.options.openaiApiKey;
    }
    return headers;
  }

  private applyPromotion(url: string): string {
    if (this.promoted.size === 0) return url;
    const parsed = new URL(url);
    const canonical = this.promoted.get(parsed.origin);
    return canonical ? canonical + url.slice(parsed.origin.length) : url;
  }

  private promote(fromUrl: string, toUrl: string): void {
    const from = new URL(fromUrl).origin;
    const to = new URL(toUrl).origin;
    this.promoted.set(from, to);
    this.log.info({ from, to }, "promoted canonical domain");
    this.options.onOriginPromoted?.(from, to);
  }
}
