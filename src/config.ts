/**
 * config.ts - Configuration surface for the Weaviate access layer
 *
 * What this file does:
 * Reads WEAVIATE_* environment variables (plus OPENAI_API_KEY), merges
 * programmatic overrides on top, and validates the result with zod.
 *
 * Every setting has a default so an empty environment still works:
 * a local server at http://localhost:8080, server-side vectorization,
 * the standard path prefixes probed, three attempts per HTTP request.
 *
 * Boolean variables accept 1/true/yes (case-insensitive); anything else
 * is false. Empty strings count as unset.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";

const TRUTHY = new Set(["1", "true", "yes"]);

const flag = (fallback: boolean) =>
  z.preprocess(
    (value) =>
      typeof value === "string" ? TRUTHY.has(value.trim().toLowerCase()) : value,
    z.boolean().default(fallback)
  );

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

/**
 * Normalizes a path prefix to a leading slash and no trailing slash.
 * "/" and "" both mean "mounted at the root".
 */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/\/+$/, "");
  if (trimmed === "") return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

const prefixList = z.preprocess(
  (value) =>
    typeof value === "string"
      ? value
          .split(",")
          .map((part) => part.trim())
          .filter((part) => part.length > 0)
      : value,
  z.array(z.string()).default([])
);

export const configSchema = z.object({
  url: z.string().min(1).default("http://localhost:8080"),
  apiKey: z.string().min(1).optional(),
  openaiApiKey: z.string().min(1).optional(),

  // Transport
  tlsVerify: flag(true),
  caBundle: z.string().min(1).optional(),
  connectTimeoutMs: positiveInt(10_000),
  readTimeoutMs: positiveInt(30_000),
  http2: flag(false),
  retries: positiveInt(3),
  retryBaseDelayMs: nonNegativeInt(500),

  // Endpoint discovery
  pathPrefix: z.string().optional(),
  pathPrefixes: prefixList,
  disablePathPatterns: flag(false),
  forceApiVersion: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["v1", "v2"]).optional()
  ),
  skipV2: flag(false),
  disableDomainRewrite: flag(false),
  useNetworkDomain: flag(false),

  // Typed client
  typedClient: flag(true),
  grpcUrl: z.string().min(1).optional(),
  grpcPort: positiveInt(50051),

  // Ingestion
  useClientVectors: flag(false),
  includeMetadata: flag(false),
  forceRestBatch: flag(false),
  batchChunkSize: positiveInt(100),
  insertLogEvery: positiveInt(25),
  insertMaxSec: positiveInt(180),
  postCountRetries: nonNegativeInt(3),
  postCountDelayMs: nonNegativeInt(300),

  // Readiness
  readyTimeoutMs: nonNegativeInt(20_000),
  readyIntervalMs: positiveInt(1_000),

  // Search
  primaryTextProp: z.string().min(1).optional(),
  queryModelName: z.string().min(1).default("voyage-4"),
  hybridAlpha: z.coerce.number().min(0).max(1).default(0.5),

  logLevel: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
});

export type BridgeConfig = z.infer<typeof configSchema>;
export type BridgeConfigOverrides = Partial<BridgeConfig>;

/** Environment variable behind each setting. */
const ENV_KEYS: Record<keyof BridgeConfig, string> = {
  url: "WEAVIATE_URL",
  apiKey: "WEAVIATE_API_KEY",
  openaiApiKey: "OPENAI_API_KEY",
  tlsVerify: "WEAVIATE_TLS_VERIFY",
  caBundle: "WEAVIATE_CA_BUNDLE",
  connectTimeoutMs: "WEAVIATE_CONNECT_TIMEOUT_MS",
  readTimeoutMs: "WEAVIATE_READ_TIMEOUT_MS",
  http2: "WEAVIATE_HTTP2",
  retries: "WEAVIATE_HTTP_RETRIES",
  retryBaseDelayMs: "WEAVIATE_HTTP_RETRY_BASE_DELAY_MS",
  pathPrefix: "WEAVIATE_PATH_PREFIX",
  pathPrefixes: "WEAVIATE_PATH_PREFIXES",
  disablePathPatterns: "WEAVIATE_DISABLE_PATH_PATTERNS",
  forceApiVersion: "WEAVIATE_FORCE_API_VERSION",
  skipV2: "WEAVIATE_SKIP_V2",
  disableDomainRewrite: "WEAVIATE_DISABLE_DOMAIN_REWRITE",
  useNetworkDomain: "WEAVIATE_USE_NETWORK_DOMAIN",
  typedClient: "WEAVIATE_TYPED_CLIENT",
  grpcUrl: "WEAVIATE_GRPC_URL",
  grpcPort: "WEAVIATE_GRPC_PORT",
  useClientVectors: "WEAVIATE_USE_CLIENT_VECTORS",
  includeMetadata: "WEAVIATE_INCLUDE_METADATA",
  forceRestBatch: "WEAVIATE_FORCE_REST_BATCH",
  batchChunkSize: "WEAVIATE_BATCH_CHUNK_SIZE",
  insertLogEvery: "WEAVIATE_INSERT_LOG_EVERY",
  insertMaxSec: "WEAVIATE_INSERT_MAX_SEC",
  postCountRetries: "WEAVIATE_POST_COUNT_RETRIES",
  postCountDelayMs: "WEAVIATE_POST_COUNT_DELAY_MS",
  readyTimeoutMs: "WEAVIATE_READY_TIMEOUT_MS",
  readyIntervalMs: "WEAVIATE_READY_INTERVAL_MS",
  primaryTextProp: "WEAVIATE_PRIMARY_TEXT_PROP",
  queryModelName: "WEAVIATE_QUERY_MODEL_NAME",
  hybridAlpha: "WEAVIATE_HYBRID_ALPHA",
  logLevel: "WEAVIATE_LOG_LEVEL",
};

/**
 * Loads configuration from the environment with overrides applied on top.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(
  overrides: BridgeConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): BridgeConfig {
  const raw: Record<string, unknown> = {};

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value.trim() !== "") {
      raw[key] = value;
    }
  }
  // An explicitly empty prefix is meaningful: "probe the root first".
  if (env.WEAVIATE_PATH_PREFIX === "") {
    raw.pathPrefix = "";
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid configuration: ${issues.join("; ")}`,
      issues
    );
  }

  const config = parsed.data;
  return {
    ...config,
    pathPrefix:
      config.pathPrefix === undefined ? undefined : normalizePrefix(config.pathPrefix),
    pathPrefixes: config.pathPrefixes.map(normalizePrefix),
  };
}
