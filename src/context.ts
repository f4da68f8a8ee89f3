/**
 * context.ts - One connection's worth of collaborators
 *
 * What this file does:
 * Builds every component for a single configuration: transport, endpoint
 * resolver, REST surface, typed client, reconciler, collection manager,
 * ingestion pipeline and search engine. Discovery state (base URL, prefix,
 * API version) and the loaded query model live on these objects, so a new
 * configuration means a new context and nothing is shared between them.
 *
 * The typed client is optional. When it is disabled or cannot connect, the
 * context runs REST-only and every component takes its REST path.
 */

import type { Dispatcher } from "undici";
import type { BridgeConfig } from "./config";
import { describeError } from "./errors";
import type { Logger } from "./logger";
import { EndpointResolver } from "./endpoint/resolver";
import { HttpTransport } from "./transport/http-transport";
import { IngestionPipeline } from "./pipeline/ingestion";
import { GraphQLSearch } from "./search/graphql-search";
import { SearchEngine } from "./search/search-engine";
import { CollectionManager } from "./vectorstore/collection-manager";
import { QueryVectorizer, type EmbeddingLoader } from "./vectorstore/query-vectorizer";
import { SchemaReconciler } from "./vectorstore/reconciler";
import { RestSurface, type RestTransport } from "./vectorstore/rest-surface";
import {
  connectWeaviateV3,
  type TypedClientFactory,
  type TypedStoreClient,
} from "./vectorstore/typed-client";

export interface ContextDependencies {
  logger: Logger;
  /** Connects the typed client (default: weaviate-client v3) */
  typedFactory?: TypedClientFactory;
  /** Replaces the HTTP transport; the context does not close it */
  transport?: RestTransport;
  /** Passed to the HTTP transport; tests use an undici MockAgent */
  dispatcher?: Dispatcher;
  embeddingLoader?: EmbeddingLoader;
}

export class ConnectionContext {
  private constructor(
    readonly config: BridgeConfig,
    readonly resolver: EndpointResolver,
    readonly rest: RestSurface,
    readonly typed: TypedStoreClient | null,
    readonly reconciler: SchemaReconciler,
    readonly manager: CollectionManager,
    readonly pipeline: IngestionPipeline,
    readonly search: SearchEngine,
    private readonly ownedTransport: HttpTransport | null
  ) {}

  static async create(config: BridgeConfig, deps: ContextDependencies): Promise<ConnectionContext> {
    const { logger } = deps;

    // The transport reports canonical-domain promotions to the resolver,
    // which needs the transport to exist first.
    let promote: (from: string, to: string) => void = () => undefined;
    let ownedTransport: HttpTransport | null = null;
    let transport: RestTransport;
    if (deps.transport) {
      transport = deps.transport;
    } else {
      ownedTransport = new HttpTransport({
        logger,
        apiKey: config.apiKey,
        openaiApiKey: config.openaiApiKey,
        tlsVerify: config.tlsVerify,
        caBundle: config.caBundle,
        connectTimeoutMs: config.connectTimeoutMs,
        readTimeoutMs: config.readTimeoutMs,
        http2: config.http2,
        retries: config.retries,
        retryBaseDelayMs: config.retryBaseDelayMs,
        domainFallback: !config.disableDomainRewrite && !config.useNetworkDomain,
        onOriginPromoted: (from, to) => promote(from, to),
        dispatcher: deps.dispatcher,
      });
      transport = ownedTransport;
    }

    const resolver = new EndpointResolver(transport, {
      logger,
      url: config.url,
      pathPrefix: config.pathPrefix,
      pathPrefixes: config.pathPrefixes,
      disablePathPatterns: config.disablePathPatterns,
      forceApiVersion: config.forceApiVersion,
      disableDomainRewrite: config.disableDomainRewrite,
      useNetworkDomain: config.useNetworkDomain,
    });
    promote = (from, to) => resolver.promoteBase(from, to);

    const rest = new RestSurface(transport, resolver, { logger, skipV2: config.skipV2 });
    const typed = config.typedClient
      ? await connectTyped(config, resolver.resolve(), deps.typedFactory ?? connectWeaviateV3, logger)
      : null;

    const reconciler = new SchemaReconciler(typed, rest, logger);
    const manager = new CollectionManager(typed, rest, reconciler, {
      logger,
      openaiApiKey: config.openaiApiKey,
      useClientVectors: config.useClientVectors,
      readyTimeoutMs: config.readyTimeoutMs,
      readyIntervalMs: config.readyIntervalMs,
    });
    const pipeline = new IngestionPipeline(typed, rest, manager, reconciler, {
      logger,
      batchChunkSize: config.batchChunkSize,
      insertLogEvery: config.insertLogEvery,
      insertMaxSec: config.insertMaxSec,
      postCountRetries: config.postCountRetries,
      postCountDelayMs: config.postCountDelayMs,
      includeMetadata: config.includeMetadata,
      forceRestBatch: config.forceRestBatch,
    });
    const vectorizer = config.useClientVectors
      ? new QueryVectorizer(config.queryModelName, logger, deps.embeddingLoader)
      : null;
    const search = new SearchEngine(typed, manager, reconciler, new GraphQLSearch(rest, logger), vectorizer, {
      logger,
      useClientVectors: config.useClientVectors,
      queryModelName: config.queryModelName,
      primaryTextProp: config.primaryTextProp,
    });

    return new ConnectionContext(
      config,
      resolver,
      rest,
      typed,
      reconciler,
      manager,
      pipeline,
      search,
      ownedTransport
    );
  }

  /** Closes the typed client and the connection pool, in that order. */
  async close(): Promise<void> {
    if (this.typed) await this.typed.close();
    if (this.ownedTransport) await this.ownedTransport.close();
  }
}

async function connectTyped(
  config: BridgeConfig,
  baseUrl: string,
  factory: TypedClientFactory,
  logger: Logger
): Promise<TypedStoreClient | null> {
  try {
    return await factory({
      baseUrl,
      apiKey: config.apiKey,
      openaiApiKey: config.openaiApiKey,
      grpcUrl: config.grpcUrl,
      grpcPort: config.grpcPort,
      logger,
    });
  } catch (error) {
    logger.warn({ url: baseUrl, err: describeError(error) }, "typed client unavailable; using REST only");
    return null;
  }
}
