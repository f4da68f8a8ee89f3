/**
 * vectorstore/index.ts - Public API for the vector store module
 *
 * Re-exports the collection-level building blocks. Applications normally
 * use WeaviateStore (../store) instead of wiring these by hand.
 */

export type {
  CollectionDefinition,
  CollectionSchema,
  DocumentRecord,
  DocumentStore,
  EmbeddingFunction,
  HybridSearchOptions,
  IngestionPath,
  IngestionReport,
  OperationResult,
  PropertyType,
  ScalarValue,
  SchemaHint,
  SearchOptions,
  SearchResult,
  SearchStrategyName,
  VectorMode,
} from "./types";
export { CONTENT_VECTOR } from "./types";

export { sanitizeCollectionName, NameRegistry, MAX_NAME_LENGTH } from "./names";
export { CollectionManager, type CollectionManagerOptions } from "./collection-manager";
export { SchemaReconciler, type RestVisibility } from "./reconciler";
export { RestSurface, type RestTransport, type EndpointSource } from "./rest-surface";
export {
  WeaviateV3Client,
  connectWeaviateV3,
  type TypedClientFactory,
  type TypedConnectOptions,
  type TypedStoreClient,
} from "./typed-client";
export { QueryVectorizer, loadVoyageEmbedding, type EmbeddingLoader } from "./query-vectorizer";
export { VoyageEmbedding, DEFAULT_MODEL } from "./embeddings";
