/**
 * store.ts - The document store callers use
 *
 * What this file does:
 * WeaviateStore is the one object an application holds. It maps caller
 * collection names to storage names, hands each call to the component that
 * owns it, and wraps every operation in a tracing span. Transport, endpoint
 * discovery and schema reconciliation stay behind it.
 *
 * Usage:
 *   const store = await WeaviateStore.connect({ config: { url: "http://localhost:8080" } });
 *   await store.ensureCollection("Board Minutes 2024");
 *   const report = await store.insert("Board Minutes 2024", documents);
 *   const results = await store.hybridSearch("Board Minutes 2024", "library hours");
 *   await store.close();
 */

import { loadConfig, type BridgeConfig, type BridgeConfigOverrides } from "./config";
import { ConnectionContext, type ContextDependencies } from "./context";
import type { EndpointDescriptor } from "./endpoint/resolver";
import { createLogger, type Logger } from "./logger";
import { withOperationTracing } from "./tracing/operation-tracing";
import { NameRegistry } from "./vectorstore/names";
import type {
  DocumentRecord,
  DocumentStore,
  HybridSearchOptions,
  IngestionReport,
  OperationResult,
  SchemaHint,
  SearchOptions,
  SearchResult,
} from "./vectorstore/types";

const DEFAULT_LIMIT = 10;

export interface StoreOptions extends Omit<ContextDependencies, "logger"> {
  /** Applied over the environment */
  config?: BridgeConfigOverrides;
  env?: NodeJS.ProcessEnv;
  /** Defaults to a pino logger at the configured level */
  logger?: Logger;
}

export class WeaviateStore implements DocumentStore {
  private readonly names = new NameRegistry();
  private overrides: BridgeConfigOverrides;

  private constructor(
    private context: ConnectionContext,
    private readonly options: StoreOptions,
    private readonly logger: Logger
  ) {
    this.overrides = { ...options.config };
  }

  /**
   * Loads configuration and connects. Never fails on an unreachable server:
   * discovery happens lazily and the typed client is optional.
   *
   * @throws ConfigurationError when a setting is invalid
   */
  static async connect(options: StoreOptions = {}): Promise<WeaviateStore> {
    const config = loadConfig(options.config, options.env);
    const logger = options.logger ?? createLogger({ level: config.logLevel });
    const context = await ConnectionContext.create(config, { ...options, logger });
    return new WeaviateStore(context, options, logger);
  }

  get config(): BridgeConfig {
    return this.context.config;
  }

  describeEndpoint(): Promise<EndpointDescriptor> {
    return withOperationTracing("describe_endpoint", {}, () => this.context.resolver.describe());
  }

  /** Every collection either surface reports, in caller names where known. */
  listCollections(): Promise<string[]> {
    return withOperationTracing("list_collections", {}, async () => {
      const storageNames = await this.context.reconciler.listCollections();
      return [...storageNames].sort().map((name) => this.names.callerNameFor(name));
    });
  }

  ensureCollection(name: string, hint?: SchemaHint): Promise<OperationResult> {
    return this.traced("ensure_collection", name, (storageName) =>
      this.context.manager.ensure(storageName, hint)
    );
  }

  ready(name: string, timeoutMs?: number, intervalMs?: number): Promise<OperationResult> {
    return this.traced("ready", name, (storageName) =>
      this.context.manager.ready(storageName, timeoutMs, intervalMs)
    );
  }

  deleteCollection(name: string): Promise<OperationResult> {
    return this.traced("delete_collection", name, (storageName) =>
      this.context.manager.delete(storageName)
    );
  }

  count(name: string): Promise<number | null> {
    return this.traced("count", name, (storageName) => this.context.manager.count(storageName));
  }

  insert(name: string, documents: DocumentRecord[]): Promise<IngestionReport> {
    return this.traced("insert", name, (storageName) =>
      this.context.pipeline.insert(name, storageName, documents)
    );
  }

  /** Tiered search with the configured hybrid weight. */
  search(name: string, query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    return this.hybridSearch(name, query, options);
  }

  hybridSearch(name: string, query: string, options: HybridSearchOptions = {}): Promise<SearchResult[]> {
    const limit = options.limit ?? DEFAULT_LIMIT;
    const alpha = options.alpha ?? this.config.hybridAlpha;
    return this.traced("search", name, (storageName) =>
      this.context.search.search({
        storageName,
        query,
        limit,
        alpha,
        filters: options.filters,
      })
    );
  }

  /**
   * Closes the current connection and builds a new one with `overrides`
   * merged over the previous ones. Discovered prefix, API version and base
   * URL start over.
   */
  async reconfigure(overrides: BridgeConfigOverrides): Promise<void> {
    const merged = { ...this.overrides, ...overrides };
    const config = loadConfig(merged, this.options.env);
    const next = await ConnectionContext.create(config, { ...this.options, logger: this.logger });
    const previous = this.context;
    this.context = next;
    this.overrides = merged;
    await previous.close();
    this.logger.info({ url: config.url }, "reconfigured");
  }

  async close(): Promise<void> {
    await this.context.close();
  }

  private traced<T>(operation: string, name: string, run: (storageName: string) => Promise<T>): Promise<T> {
    const storageName = this.names.resolve(name);
    return withOperationTracing(
      operation,
      { "weaviate.collection": name, "weaviate.storage_name": storageName },
      () => run(storageName)
    );
  }
}
