/**
 * types.ts - Domain types for the Weaviate access layer
 *
 * What this file does:
 * Defines the records that cross the public boundary (Document Records in,
 * Search Results, Ingestion Reports and Operation Results out) and the
 * schema shapes the internal components pass between them.
 *
 * Callers only ever see DocumentStore. Transport, endpoint discovery and
 * schema reconciliation stay behind it.
 *
 * Key concepts:
 * - Collection: a named, schema-bearing container (a Weaviate class)
 * - DocumentRecord: caller input for ingestion
 * - StorageObject: a record as sent, filtered to the collection's schema
 * - SearchResult: a normalized hit with a score in [0,1]
 */

import type { EndpointDescriptor } from "../endpoint/resolver";

/**
 * A function that converts text into embedding vectors.
 *
 * Used for client-side query vectors on deployments without a server-side
 * vectorizer. Different models (Voyage AI, OpenAI, local models) all do the
 * same thing, so the query vectorizer only depends on this interface.
 */
export interface EmbeddingFunction {
  /**
   * @returns One vector per input text, in input order
   */
  embed(texts: string[]): Promise<number[][]>;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export type PropertyType = "text" | "date" | "int" | "number" | "boolean" | "object";

export interface PropertyDefinition {
  name: string;
  dataType: PropertyType;
  nestedProperties?: PropertyDefinition[];
}

/**
 * How objects in a collection get their vectors.
 *
 * - server: a server-side text2vec-openai vectorizer bound to `content`
 * - named: a self-provided vector in the named slot `content`
 * - none: no vector configuration (keyword search only, or a default vector)
 */
export type VectorMode = "server" | "named" | "none";

/** Named vector slot the project binds to the `content` property. */
export const CONTENT_VECTOR = "content";

export interface CollectionDefinition {
  /** Sanitized storage name */
  name: string;
  description?: string;
  properties: PropertyDefinition[];
  vectorMode: VectorMode;
}

/** What the server reports about an existing collection. */
export interface CollectionSchema {
  name: string;
  /** Property name -> Weaviate data type ("text", "date", "object", ...) */
  properties: Record<string, string>;
  namedVectors: string[];
  vectorizer?: string;
}

/** Extra properties a caller wants on a new collection. */
export interface SchemaHint {
  description?: string;
  /** Property name -> data type; unknown types become "text" */
  properties?: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Ingestion
// ---------------------------------------------------------------------------

export type ScalarValue = string | number | boolean;

/**
 * A record to ingest.
 *
 * Only `content` is required. `source` defaults to "unknown" and
 * `sourceType` to "document". `metadata` is stored only when metadata
 * inclusion is enabled, since its shape drifts the most between producers.
 */
export interface DocumentRecord {
  content: string;
  source?: string;
  sourceType?: string;
  page?: number;
  section?: string;
  /** Default (unnamed) vector */
  vector?: number[];
  /** Named vectors, keyed by slot name */
  vectors?: Record<string, number[]>;
  metadata?: Record<string, ScalarValue>;
  /** Additional schema properties, passed through when the schema has them */
  properties?: Record<string, ScalarValue>;
}

export type StorageValue = ScalarValue | { kv: string };

export type StorageProperties = Record<string, StorageValue>;

export interface StorageObject {
  properties: StorageProperties;
  vectors?: number[] | Record<string, number[]>;
}

export type IngestionPath = "typed" | "rest" | "none";

export interface IngestionReport {
  /** Caller name */
  collection: string;
  storageName: string;
  success: boolean;
  path: IngestionPath;
  attempted: number;
  /** Objects the server accepted, by its per-object or per-chunk response */
  processed: number;
  preCount: number | null;
  postCount: number | null;
  insertedDelta: number | null;
  durationMs: number;
  warnings: string[];
  error: string | null;
}

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

export type SearchStrategyName =
  | "hybrid"
  | "near-vector"
  | "near-text"
  | "keyword"
  | "graphql";

/**
 * A normalized search hit.
 *
 * Scores are in [0,1] and comparable only within one call: the strategy
 * that produced them is recorded alongside.
 */
export interface SearchResult {
  id: string;
  content: string;
  source: string;
  sourceType: string;
  page?: number;
  section?: string;
  metadata: Record<string, unknown>;
  score: number;
  strategy: SearchStrategyName;
}

export interface SearchOptions {
  /** Maximum results (default: 10) */
  limit?: number;
  /** Equality filters applied to result fields and metadata */
  filters?: Record<string, ScalarValue>;
}

export interface HybridSearchOptions extends SearchOptions {
  /** Vector weight in the blend: 0 is keyword-only, 1 is vector-only */
  alpha?: number;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/** Outcome of create, delete and readiness operations. */
export interface OperationResult {
  ok: boolean;
  storageName: string;
  message: string;
}

/**
 * The interface callers use. Every collection argument is a caller name;
 * the store maps it to a storage name.
 */
export interface DocumentStore {
  describeEndpoint(): Promise<EndpointDescriptor>;
  listCollections(): Promise<string[]>;
  ensureCollection(name: string, hint?: SchemaHint): Promise<OperationResult>;
  ready(name: string, timeoutMs?: number, intervalMs?: number): Promise<OperationResult>;
  deleteCollection(name: string): Promise<OperationResult>;
  count(name: string): Promise<number | null>;
  insert(name: string, documents: DocumentRecord[]): Promise<IngestionReport>;
  search(name: string, query: string, options?: SearchOptions): Promise<SearchResult[]>;
  hybridSearch(name: string, query: string, options?: HybridSearchOptions): Promise<SearchResult[]>;
  close(): Promise<void>;
}
