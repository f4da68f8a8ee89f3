/**
 * index.ts - Library entry point for weaviate-bridge
 *
 * Usage:
 *   import { WeaviateStore } from "weaviate-bridge";
 *
 *   const store = await WeaviateStore.connect();
 *   await store.ensureCollection("Board Minutes 2024");
 *   await store.insert("Board Minutes 2024", [{ content: "Budget approved", source: "minutes.pdf" }]);
 *   const results = await store.search("Board Minutes 2024", "budget");
 */

export { WeaviateStore, type StoreOptions } from "./store";
export { ConnectionContext, type ContextDependencies } from "./context";
export { loadConfig, configSchema, type BridgeConfig, type BridgeConfigOverrides } from "./config";
export { ConfigurationError, TransportError, describeError } from "./errors";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./logger";
export { EndpointResolver, type ApiVersion, type EndpointDescriptor } from "./endpoint/resolver";
export { HttpTransport, type TransportOptions } from "./transport/http-transport";
export { IngestionPipeline, type IngestionOptions } from "./pipeline/ingestion";
export { SearchEngine, GraphQLSearch, formatSearchResults } from "./search";
export * from "./vectorstore";
