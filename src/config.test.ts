import { describe, it, expect } from "vitest";
import { loadConfig, normalizePrefix } from "./config";
import { ConfigurationError } from "./errors";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({}, {});

    expect(config.url).toBe("http://localhost:8080");
    expect(config.retries).toBe(3);
    expect(config.tlsVerify).toBe(true);
    expect(config.typedClient).toBe(true);
    expect(config.pathPrefix).toBeUndefined();
    expect(config.pathPrefixes).toEqual([]);
    expect(config.hybridAlpha).toBe(0.5);
    expect(config.queryModelName).toBe("voyage-4");
  });

  it("reads WEAVIATE_* variables", () => {
    const config = loadConfig(
      {},
      {
        WEAVIATE_URL: "https://db.example.test",
        WEAVIATE_API_KEY: "test-secret",
        WEAVIATE_TLS_VERIFY: "no",
        WEAVIATE_HTTP2: "YES",
        WEAVIATE_HTTP_RETRIES: "5",
        WEAVIATE_PATH_PREFIXES: "weaviate/, /api/ ,",
        WEAVIATE_FORCE_API_VERSION: "V2",
        WEAVIATE_HYBRID_ALPHA: "0.25",
      }
    );

    expect(config).toMatchObject({
      url: "https://db.example.test",
      apiKey: "test-secret",
      tlsVerify: false,
      http2: true,
      retries: 5,
      pathPrefixes: ["/weaviate", "/api"],
      forceApiVersion: "v2",
      hybridAlpha: 0.25,
    });
  });

  it("keeps an explicitly empty path prefix", () => {
    expect(loadConfig({}, { WEAVIATE_PATH_PREFIX: "" }).pathPrefix).toBe("");
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({}, { WEAVIATE_URL: "  " }).url).toBe("http://localhost:8080");
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfig(
      { url: "http://override:8080", batchChunkSize: 10 },
      { WEAVIATE_URL: "http://env:8080", WEAVIATE_BATCH_CHUNK_SIZE: "50" }
    );

    expect(config.url).toBe("http://override:8080");
    expect(config.batchChunkSize).toBe(10);
  });

  it("rejects invalid settings with every issue listed", () => {
    let caught: unknown;
    try {
      loadConfig({}, { WEAVIATE_HYBRID_ALPHA: "1.5", WEAVIATE_BATCH_CHUNK_SIZE: "0" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.issues.map((issue) => issue.split(":")[0]).sort()).toEqual([
        "batchChunkSize",
        "hybridAlpha",
      ]);
    }
  });
});

describe("normalizePrefix", () => {
  it("adds a leading slash and drops trailing ones", () => {
    expect(normalizePrefix("weaviate/")).toBe("/weaviate");
    expect(normalizePrefix("/api//")).toBe("/api");
  });

  it("maps the root to the empty string", () => {
    expect(normalizePrefix("/")).toBe("");
    expect(normalizePrefix("")).toBe("");
  });
});
