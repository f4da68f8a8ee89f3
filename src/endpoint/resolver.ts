/**
 * resolver.ts - Endpoint discovery for the REST surfaces
 *
 * What this file does:
 * Works out where the REST API actually lives for a configured base URL.
 * Deployments differ in three ways that matter:
 *
 * 1. Domain: hosted clusters answer on `.weaviate.cloud` and, for older
 *    clusters, `.weaviate.network`. The base URL is normalized once.
 * 2. Path prefix: reverse proxies and gateways mount the API under `/api`,
 *    `/rest`, `/weaviate`, ... Prefixes are probed until one answers.
 * 3. API version: the v2 collections API exists only on some servers; v1
 *    (schema, batch, GraphQL) is assumed when v2 cannot be confirmed.
 *
 * Results are cached on the resolver, which lives on the connection context,
 * so discovery runs once per configuration. Concurrent callers share the
 * in-flight probe. Failures are logged and never thrown: a failed prefix
 * discovery falls back to the root and is probed again once
 * PREFIX_RETRY_MS has passed; a failed version probe falls back to v1.
 */

import type { Logger } from "../logger";
import { TransportError, describeError } from "../errors";
import type { HttpResponse, HttpMethod } from "../transport/http-transport";
import { isConsoleHost, normalizeBaseUrl } from "../transport/domains";

export type ApiVersion = "v1" | "v2";

export interface EndpointDescriptor {
  baseUrl: string;
  prefix: string;
  apiVersion: ApiVersion;
}

/** The slice of the transport the resolver needs. */
export interface ProbeTransport {
  request(method: HttpMethod, url: string): Promise<HttpResponse>;
}

export interface ResolverOptions {
  logger: Logger;
  url: string;
  pathPrefix?: string;
  pathPrefixes: string[];
  disablePathPatterns: boolean;
  forceApiVersion?: ApiVersion;
  disableDomainRewrite: boolean;
  useNetworkDomain: boolean;
}

/** How long a failed prefix discovery answers "root" before probing again. */
export const PREFIX_RETRY_MS = 5_000;

export const DEFAULT_PREFIXES = ["", "/weaviate", "/api", "/rest", "/v1", "/v2"];

/** Stable endpoints that exist on any deployment of the matching version. */
export const PROBE_PATHS = [
  "/v2/collections",
  "/v1/schema",
  "/v1/.well-known/ready",
  "/v1/graphql",
];

/**
 * Status codes that prove the endpoint exists even if access differs.
 * 401/403 mean "exists, needs auth"; 405 means "exists, wrong method".
 */
export const PROBE_SUCCESS_CODES = new Set([200, 201, 204, 401, 403, 405]);

/** Full paths seen on managed gateways, tried when no prefix answers. */
export const KNOWN_PATH_PATTERNS = [
  "/api/rest/v2/collections",
  "/api/rest/v1/schema",
  "/rest/v2/collections",
  "/rest/v1/schema",
  "/api/v1/.well-known/ready",
  "/api/v1/graphql",
  "/api/weaviate/v2/collections",
  "/api/weaviate/v1/schema",
  "/api/weaviate/v1/.well-known/ready",
  "/api/weaviate/v1/graphql",
  "/v1/.well-known/ready",
  "/v1/graphql",
  "/v1/schema",
  "/v2/collections",
];

/** The part of a full pattern before its versioned segment. */
export function prefixFromPattern(pattern: string): string {
  const match = /^(.*?)\/v[12]\//.exec(pattern);
  return match ? match[1] : "";
}

export class EndpointResolver {
  private readonly log: Logger;
  private baseUrl: string | null = null;

  /** Set only once a prefix has answered. */
  private prefix: string | undefined;
  private prefixFailedAt: number | null = null;
  private prefixInFlight: Promise<string | null> | null = null;

  private apiVersion: ApiVersion | undefined;
  private versionInFlight: Promise<ApiVersion> | null = null;

  constructor(
    private readonly transport: ProbeTransport,
    private readonly options: ResolverOptions
  ) {
    this.log = options.logger.child({ component: "endpoint-resolver" });
  }

  /**
   * Normalized base URL. A value that cannot be parsed is logged and
   * returned trimmed, so the failure shows up at the first request.
   */
  resolve(): string {
    if (this.baseUrl !== null) return this.baseUrl;

    const raw = this.options.url.trim();
    try {
      this.baseUrl = normalizeBaseUrl(raw, this.options);
      if (this.baseUrl !== raw.replace(/\/+$/, "")) {
        this.log.info({ from: raw, to: this.baseUrl }, "normalized base URL");
      }
      if (isConsoleHost(new URL(this.baseUrl).hostname)) {
        this.log.warn(
          { url: this.baseUrl },
          "base URL points at the web console, not a cluster endpoint"
        );
      }
    } catch (error) {
      this.log.error({ url: raw, err: describeError(error) }, "invalid base URL");
      this.baseUrl = raw.replace(/\/+$/, "");
    }
    return this.baseUrl;
  }

  /**
   * Finds the path prefix the REST API is mounted under.
   *
   * Probes the configured prefix, the configured prefix list, then the
   * defaults, each against PROBE_PATHS; then the known full patterns. The
   * first hit is cached. A transient connection failure stops probing since
   * every other path on the host would fail the same way. A failure is not
   * cached: callers get null (the root) until PREFIX_RETRY_MS has passed,
   * then the next call probes again.
   */
  discoverPrefix(force = false): Promise<string | null> {
    if (!force && this.prefix !== undefined) {
      return Promise.resolve(this.prefix);
    }
    if (
      !force &&
      this.prefixFailedAt !== null &&
      Date.now() - this.prefixFailedAt < PREFIX_RETRY_MS
    ) {
      return Promise.resolve(null);
    }
    if (!force && this.prefixInFlight) {
      return this.prefixInFlight;
    }

    const probe = this.probePrefixes()
      .then((prefix) => {
        if (prefix === null) {
          this.prefixFailedAt = Date.now();
        } else {
          this.prefix = prefix;
          this.prefixFailedAt = null;
        }
        return prefix;
      })
      .finally(() => {
        if (this.prefixInFlight === probe) this.prefixInFlight = null;
      });
    this.prefixInFlight = probe;
    return probe;
  }

  /**
   * Detects whether the server speaks the v2 collections API.
   * An explicit override always wins.
   */
  detectApiVersion(force = false): Promise<ApiVersion> {
    if (this.options.forceApiVersion) {
      return Promise.resolve(this.options.forceApiVersion);
    }
    if (!force && this.apiVersion !== undefined) {
      return Promise.resolve(this.apiVersion);
    }
    if (!force && this.versionInFlight) {
      return this.versionInFlight;
    }

    const probe = this.probeVersion()
      .then((version) => {
        this.apiVersion = version;
        return version;
      })
      .finally(() => {
        if (this.versionInFlight === probe) this.versionInFlight = null;
      });
    this.versionInFlight = probe;
    return probe;
  }

  /** URLs to try for a path: under the discovered prefix, then at the root. */
  async candidateUrls(path: string): Promise<string[]> {
    const prefix = (await this.discoverPrefix()) ?? "";
    const base = this.resolve();
    const urls = [`${base}${prefix}${path}`];
    if (prefix !== "") {
      urls.push(`${base}${path}`);
    }
    return urls;
  }

  async describe(): Promise<EndpointDescriptor> {
    const prefix = (await this.discoverPrefix()) ?? "";
    const apiVersion = await this.detectApiVersion();
    // Read the base last: a probe may have promoted the canonical domain
    return { baseUrl: this.resolve(), prefix, apiVersion };
  }

  /** Called by the transport after a successful canonical-domain fallback. */
  promoteBase(fromOrigin: string, toOrigin: string): void {
    const base = this.resolve();
    if (base.startsWith(fromOrigin)) {
      this.baseUrl = toOrigin + base.slice(fromOrigin.length);
      this.log.info({ url: this.baseUrl }, "switched base URL to canonical domain");
    }
  }

  // -------------------------------------------------------------------------
  // Probing
  // -------------------------------------------------------------------------

  private prefixCandidates(): string[] {
    const ordered = [
      ...(this.options.pathPrefix !== undefined ? [this.options.pathPrefix] : []),
      ...this.options.pathPrefixes,
      ...DEFAULT_PREFIXES,
    ];
    return [...new Set(ordered)];
  }

  private async probePrefixes(): Promise<string | null> {
    const base = this.resolve();

    for (const prefix of this.prefixCandidates()) {
      for (const path of PROBE_PATHS) {
        const outcome = await this.probe(`${base}${prefix}${path}`);
        if (outcome === "unreachable") return this.discoveryFailed(base);
        if (outcome === "hit") {
          this.log.info({ prefix: prefix || "/", probe: path }, "discovered path prefix");
          return prefix;
        }
      }
    }

    if (!this.options.disablePathPatterns) {
      for (const pattern of KNOWN_PATH_PATTERNS) {
        const outcome = await this.probe(`${base}${pattern}`);
        if (outcome === "unreachable") return this.discoveryFailed(base);
        if (outcome === "hit") {
          const prefix = prefixFromPattern(pattern);
          this.log.info({ prefix: prefix || "/", pattern }, "discovered path prefix from pattern");
          return prefix;
        }
      }
    }

    return this.discoveryFailed(base);
  }

  private discoveryFailed(base: string): null {
    this.log.warn({ url: base }, "no path prefix answered; using the root");
    return null;
  }

  private async probe(url: string): Promise<"hit" | "miss" | "unreachable"> {
    try {
      const response = await this.transport.request("GET", url);
      return PROBE_SUCCESS_CODES.has(response.status) ? "hit" : "miss";
    } catch (error) {
      this.log.debug({ url, err: describeError(error) }, "probe failed");
      return error instanceof TransportError && error.transient ? "unreachable" : "miss";
    }
  }

  private async probeVersion(): Promise<ApiVersion> {
    const prefix = (await this.discoverPrefix()) ?? "";
    const base = this.resolve();

    const version = await this.statusOf(`${base}${prefix}/v2/.well-known/weaviate-version`);
    if (version === 200) return "v2";

    const listing = await this.statusOf(`${base}${prefix}/v2/collections`);
    if (listing !== null && PROBE_SUCCESS_CODES.has(listing)) return "v2";

    return "v1";
  }

  private async statusOf(url: string): Promise<number | null> {
    try {
      return (await this.transport.request("GET", url)).status;
    } catch (error) {
      this.log.debug({ url, err: describeError(error) }, "API version probe failed");
      return null;
    }
  }
}
