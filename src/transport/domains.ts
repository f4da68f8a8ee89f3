/**
 * domains.ts - Base URL normalization and the alternate/canonical domain rules
 *
 * Hosted clusters answer on two public suffixes: the older
 * `*.weaviate.network` and the canonical `*.weaviate.cloud`. Some networks
 * can resolve only one of them, so the resolver rewrites cluster hosts to
 * the canonical suffix up front, and the transport uses the same rules to
 * fall back once when a `.network` host stops answering.
 */

export const ALTERNATE_SUFFIX = ".weaviate.network";
export const CANONICAL_SUFFIX = ".weaviate.cloud";

/** Host suffixes that are always served over TLS. */
const CLOUD_SUFFIXES = [CANONICAL_SUFFIX, ALTERNATE_SUFFIX];

/**
 * A cluster host: a slug followed by at least one more label before the
 * alternate suffix (e.g. `my-cluster.c0.europe-west3.gcp.weaviate.network`).
 */
const CLUSTER_HOST_PATTERN = /^[a-z0-9-]+(\.[a-z0-9-]+)+\.weaviate\.network$/;

/** Web console links are not API endpoints. */
const CONSOLE_HOST = "console.weaviate.cloud";

export interface DomainRewriteOptions {
  disableDomainRewrite: boolean;
  useNetworkDomain: boolean;
}

export function isCloudHost(host: string): boolean {
  const lower = host.toLowerCase();
  return CLOUD_SUFFIXES.some((suffix) => lower.endsWith(suffix));
}

export function isClusterHost(host: string): boolean {
  return CLUSTER_HOST_PATTERN.test(host.toLowerCase());
}

export function isConsoleHost(host: string): boolean {
  return host.toLowerCase() === CONSOLE_HOST;
}

/**
 * Swaps the alternate suffix for the canonical one, or returns null when
 * the URL's host is not an alternate-domain cluster host.
 */
export function toCanonicalUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (!isClusterHost(parsed.hostname)) {
    return null;
  }
  parsed.hostname =
    parsed.hostname.slice(0, -ALTERNATE_SUFFIX.length) + CANONICAL_SUFFIX;
  return stripTrailingSlash(parsed.toString());
}

/**
 * Normalizes a configured base URL.
 *
 * - No scheme: `https` for cloud hosts, `http` otherwise
 * - `http` on a cloud host is upgraded to `https`
 * - Cluster hosts on the alternate suffix are rewritten to the canonical
 *   suffix unless rewriting is disabled or the alternate domain is preferred
 * - Trailing slashes are removed
 *
 * @throws TypeError when the value cannot be parsed as a URL
 */
export function normalizeBaseUrl(
  raw: string,
  options: DomainRewriteOptions
): string {
  let value = raw.trim();
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) {
    const host = value.split(/[/:]/, 1)[0] ?? "";
    value = `${isCloudHost(host) ? "https" : "http"}://${value}`;
  }

  const parsed = new URL(value);
  if (parsed.protocol === "http:" && isCloudHost(parsed.hostname)) {
    parsed.protocol = "https:";
  }

  const normalized = stripTrailingSlash(parsed.toString());
  if (options.disableDomainRewrite || options.useNetworkDomain) {
    return normalized;
  }
  return toCanonicalUrl(normalized) ?? normalized;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
