/**
 * resolver.test.ts - Unit tests for endpoint discovery
 *
 * Uses a fake ProbeTransport that answers from a URL -> status table;
 * unlisted URLs get a 404.
 */

import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import {
  EndpointResolver,
  PREFIX_RETRY_MS,
  prefixFromPattern,
  type ResolverOptions,
} from "./resolver";
import { TransportError } from "../errors";
import type { HttpMethod, HttpResponse } from "../transport/http-transport";

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const BASE = "http://localhost:8080";

function createFakeTransport(statuses: Record<string, number>, unreachable = false) {
  return {
    request: vi.fn(async (_method: HttpMethod, url: string): Promise<HttpResponse> => {
      if (unreachable) {
        throw new TransportError(`GET ${url} failed: connect ECONNREFUSED`, {
          url,
          transient: true,
          attempts: 3,
        });
      }
      const status = statuses[url] ?? 404;
      return { status, url, text: "", data: null };
    }),
  };
}

function makeOptions(overrides: Partial<ResolverOptions> = {}): ResolverOptions {
  return {
    logger: pino({ level: "silent" }),
    url: BASE,
    pathPrefixes: [],
    disablePathPatterns: false,
    disableDomainRewrite: false,
    useNetworkDomain: false,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// resolve
// ---------------------------------------------------------------------------

describe("resolve", () => {
  it("rewrites an alternate-domain cluster host to the canonical domain", () => {
    const resolver = new EndpointResolver(
      createFakeTransport({}),
      makeOptions({ url: "https://cluster.example.weaviate.network" })
    );

    expect(resolver.resolve()).toBe("https://cluster.example.weaviate.cloud");
  });

  it("returns unparseable URLs trimmed instead of throwing", () => {
    const resolver = new EndpointResolver(createFakeTransport({}), makeOptions({ url: " http:// " }));

    expect(resolver.resolve()).toBe("http:");
  });
});

// ---------------------------------------------------------------------------
// discoverPrefix
// ---------------------------------------------------------------------------

describe("discoverPrefix", () => {
  it("returns the root when the root answers", async () => {
    const transport = createFakeTransport({ [`${BASE}/v1/schema`]: 200 });
    const resolver = new EndpointResolver(transport, makeOptions());

    await expect(resolver.discoverPrefix()).resolves.toBe("");
    expect(transport.request.mock.calls.map((call) => call[1])).toEqual([
      `${BASE}/v2/collections`,
      `${BASE}/v1/schema`,
    ]);
  });

  it("probes default prefixes in order and counts 401 as a hit", async () => {
    const transport = createFakeTransport({ [`${BASE}/api/v1/.well-known/ready`]: 401 });
    const resolver = new EndpointResolver(transport, makeOptions());

    await expect(resolver.discoverPrefix()).resolves.toBe("/api");
  });

  it("tries the configured prefix before the defaults", async () => {
    const transport = createFakeTransport({
      [`${BASE}/v1/schema`]: 200,
      [`${BASE}/custom/v1/graphql`]: 405,
    });
    const resolver = new EndpointResolver(transport, makeOptions({ pathPrefix: "/custom" }));

    await expect(resolver.discoverPrefix()).resolves.toBe("/custom");
  });

  it("tries the configured prefix list after the single prefix", async () => {
    const transport = createFakeTransport({ [`${BASE}/gw/v2/collections`]: 200 });
    const resolver = new EndpointResolver(
      transport,
      makeOptions({ pathPrefix: "/nothing", pathPrefixes: ["/gw"] })
    );

    await expect(resolver.discoverPrefix()).resolves.toBe("/gw");
    expect(transport.request.mock.calls[0][1]).toBe(`${BASE}/nothing/v2/collections`);
  });

  it("caches the discovered prefix", async () => {
    const transport = createFakeTransport({ [`${BASE}/weaviate/v1/schema`]: 200 });
    const resolver = new EndpointResolver(transport, makeOptions());

    await resolver.discoverPrefix();
    const callsAfterFirst = transport.request.mock.calls.length;
    await expect(resolver.discoverPrefix()).resolves.toBe("/weaviate");

    expect(transport.request).toHaveBeenCalledTimes(callsAfterFirst);
  });

  it("shares one probe between concurrent callers", async () => {
    const transport = createFakeTransport({ [`${BASE}/v2/collections`]: 200 });
    const resolver = new EndpointResolver(transport, makeOptions());

    const [a, b] = await Promise.all([resolver.discoverPrefix(), resolver.discoverPrefix()]);

    expect(a).toBe("");
    expect(b).toBe("");
    expect(transport.request).toHaveBeenCalledTimes(1);
  });

  it("falls back to known path patterns and derives the prefix", async () => {
    const transport = createFakeTransport({ [`${BASE}/api/weaviate/v1/schema`]: 200 });
    const resolver = new EndpointResolver(transport, makeOptions());

    await expect(resolver.discoverPrefix()).resolves.toBe("/api/weaviate");
  });

  it("skips the patterns when disabled and reports no prefix", async () => {
    const transport = createFakeTransport({ [`${BASE}/api/weaviate/v1/schema`]: 200 });
    const resolver = new EndpointResolver(transport, makeOptions({ disablePathPatterns: true }));

    await expect(resolver.discoverPrefix()).resolves.toBeNull();
    // 6 default prefixes x 4 probe paths
    expect(transport.request).toHaveBeenCalledTimes(24);
  });

  it("stops probing when the host is unreachable", async () => {
    const transport = createFakeTransport({}, true);
    const resolver = new EndpointResolver(transport, makeOptions());

    await expect(resolver.discoverPrefix()).resolves.toBeNull();
    expect(transport.request).toHaveBeenCalledTimes(1);

    await resolver.discoverPrefix(true);
    expect(transport.request).toHaveBeenCalledTimes(2);
  });

  it("rediscovers the prefix once a failed discovery's retry window has passed", async () => {
    const clock = vi.spyOn(Date, "now").mockReturnValue(1_000);
    let down = true;
    const transport = {
      request: vi.fn(async (_method: HttpMethod, url: string): Promise<HttpResponse> => {
        if (down) {
          throw new TransportError(`GET ${url} failed: connect ECONNREFUSED`, {
            url,
            transient: true,
            attempts: 3,
          });
        }
        const status = url === `${BASE}/api/v1/schema` ? 200 : 404;
        return { status, url, text: "", data: null };
      }),
    };
    const resolver = new EndpointResolver(transport, makeOptions());

    await expect(resolver.discoverPrefix()).resolves.toBeNull();

    // Within the window the root is used without probing
    down = false;
    await expect(resolver.discoverPrefix()).resolves.toBeNull();
    expect(transport.request).toHaveBeenCalledTimes(1);

    clock.mockReturnValue(1_000 + PREFIX_RETRY_MS);
    await expect(resolver.discoverPrefix()).resolves.toBe("/api");
    await expect(resolver.candidateUrls("/v1/graphql")).resolves.toEqual([
      `${BASE}/api/v1/graphql`,
      `${BASE}/v1/graphql`,
    ]);
    clock.mockRestore();
  });
});

describe("prefixFromPattern", () => {
  it("takes everything before the versioned segment", () => {
    expect(prefixFromPattern("/api/rest/v2/collections")).toBe("/api/rest");
    expect(prefixFromPattern("/v1/schema")).toBe("");
  });
});

// ---------------------------------------------------------------------------
// detectApiVersion
// ---------------------------------------------------------------------------

describe("detectApiVersion", () => {
  it("honors an explicit override without probing", async () => {
    const transport = createFakeTransport({});
    const resolver = new EndpointResolver(transport, makeOptions({ forceApiVersion: "v2" }));

    await expect(resolver.detectApiVersion()).resolves.toBe("v2");
    expect(transport.request).not.toHaveBeenCalled();
  });

  it("detects v2 from the version endpoint", async () => {
    const transport = createFakeTransport({
      [`${BASE}/v1/schema`]: 200,
      [`${BASE}/v2/.well-known/weaviate-version`]: 200,
    });
    const resolver = new EndpointResolver(transport, makeOptions());

    await expect(resolver.detectApiVersion()).resolves.toBe("v2");
  });

  it("detects v2 from the collections listing", async () => {
    const transport = createFakeTransport({ [`${BASE}/v2/collections`]: 403 });
    const resolver = new EndpointResolver(transport, makeOptions());

    await expect(resolver.detectApiVersion()).resolves.toBe("v2");
  });

  it("defaults to v1", async () => {
    const transport = createFakeTransport({ [`${BASE}/v1/schema`]: 200 });
    const resolver = new EndpointResolver(transport, makeOptions());

    await expect(resolver.detectApiVersion()).resolves.toBe("v1");
  });
});

// ---------------------------------------------------------------------------
// candidateUrls / describe / promoteBase
// ---------------------------------------------------------------------------

describe("candidateUrls", () => {
  it("lists the prefixed URL then the root URL", async () => {
    const transport = createFakeTransport({ [`${BASE}/rest/v1/schema`]: 200 });
    const resolver = new EndpointResolver(transport, makeOptions());

    await expect(resolver.candidateUrls("/v1/graphql")).resolves.toEqual([
      `${BASE}/rest/v1/graphql`,
      `${BASE}/v1/graphql`,
    ]);
  });

  it("lists one URL when mounted at the root", async () => {
    const transport = createFakeTransport({ [`${BASE}/v2/collections`]: 200 });
    const resolver = new EndpointResolver(transport, makeOptions());

    await expect(resolver.candidateUrls("/v1/schema")).resolves.toEqual([`${BASE}/v1/schema`]);
  });
});

describe("describe", () => {
  it("returns base, prefix and version together", async () => {
    const transport = createFakeTransport({ [`${BASE}/v1/schema`]: 200 });
    const resolver = new EndpointResolver(transport, makeOptions({ forceApiVersion: "v1" }));

    await expect(resolver.describe()).resolves.toEqual({
      baseUrl: BASE,
      prefix: "",
      apiVersion: "v1",
    });
  });
});

describe("promoteBase", () => {
  it("swaps the origin of the base URL", () => {
    const resolver = new EndpointResolver(
      createFakeTransport({}),
      makeOptions({ url: "https://a.b.weaviate.network", useNetworkDomain: true })
    );

    resolver.promoteBase("https://a.b.weaviate.network", "https://a.b.weaviate.cloud");

    expect(resolver.resolve()).toBe("https://a.b.weaviate.cloud");
  });
});
