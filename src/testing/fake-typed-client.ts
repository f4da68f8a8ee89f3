/**
 * fake-typed-client.ts - In-memory TypedStoreClient for tests
 *
 * Holds collections and objects in Maps. Keyword matching stands in for
 * BM25 (score = fraction of query terms found in `content`), cosine
 * similarity for near-vector. near-text only works on collections created
 * with the server vectorizer, as on a real deployment.
 *
 * `blind` makes the client behave like a typed client whose cache has not
 * caught up: listings are empty and every per-collection call fails.
 * `failures` injects an error into one operation.
 */

import { randomUUID } from "node:crypto";
import type {
  TypedBatchResult,
  TypedHit,
  TypedQuery,
  TypedStoreClient,
} from "../vectorstore/typed-client";
import type {
  CollectionDefinition,
  CollectionSchema,
  StorageObject,
  StorageProperties,
} from "../vectorstore/types";

export type FakeOperation =
  | "listCollections"
  | "exists"
  | "describe"
  | "create"
  | "delete"
  | "refresh"
  | "count"
  | "insertMany"
  | "query";

export interface FakeObject {
  id: string;
  properties: StorageProperties;
  vectors?: StorageObject["vectors"];
}

export interface FakeCollection {
  schema: CollectionSchema;
  objects: FakeObject[];
}

function terms(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}

function cosine(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  return normA === 0 || normB === 0 ? 0 : dot / Math.sqrt(normA * normB);
}

function hasVectorizer(collection: FakeCollection): boolean {
  return collection.schema.vectorizer === "text2vec-openai";
}

export class FakeTypedClient implements TypedStoreClient {
  readonly clientVersion = "fake";
  readonly collections = new Map<string, FakeCollection>();
  readonly failures = new Map<FakeOperation, Error>();
  readonly calls: string[] = [];
  blind = false;
  refreshCount = 0;
  closed = false;

  /** Adds a collection directly, as if another process created it. */
  seed(schema: CollectionSchema, objects: FakeObject[] = []): void {
    this.collections.set(schema.name, { schema, objects });
  }

  async listCollections(): Promise<string[]> {
    this.enter("listCollections");
    return this.blind ? [] : [...this.collections.keys()];
  }

  async exists(name: string): Promise<boolean> {
    this.enter("exists");
    return !this.blind && this.collections.has(name);
  }

  async describe(name: string): Promise<CollectionSchema | null> {
    this.enter("describe");
    return this.collections.get(name)?.schema ?? null;
  }

  async create(definition: CollectionDefinition): Promise<void> {
    this.enter("create");
    if (this.collections.has(definition.name)) {
      throw new Error(`collection ${definition.name} already exists`);
    }
    const properties: Record<string, string> = {};
    for (const property of definition.properties) properties[property.name] = property.dataType;
    this.collections.set(definition.name, {
      schema: {
        name: definition.name,
        properties,
        namedVectors: definition.vectorMode === "none" ? [] : ["content"],
        vectorizer: definition.vectorMode === "server" ? "text2vec-openai" : "none",
      },
      objects: [],
    });
  }

  async delete(name: string): Promise<void> {
    this.enter("delete");
    this.collections.delete(name);
  }

  async refresh(): Promise<void> {
    this.enter("refresh");
    this.refreshCount++;
  }

  async count(name: string): Promise<number> {
    this.enter("count");
    return this.visible(name).objects.length;
  }

  async insertMany(name: string, objects: StorageObject[]): Promise<TypedBatchResult> {
    this.enter("insertMany");
    const collection = this.visible(name);
    for (const object of objects) {
      collection.objects.push({ id: randomUUID(), properties: object.properties, vectors: object.vectors });
    }
    return { inserted: objects.length, errors: [] };
  }

  async query(name: string, query: TypedQuery): Promise<TypedHit[]> {
    this.enter("query");
    const collection = this.visible(name);

    switch (query.kind) {
      case "bm25":
        return this.keyword(collection, query.query, query.limit);
      case "hybrid":
        // The vector half of a hybrid needs a server vectorizer or a query vector
        if (query.alpha > 0 && !query.vector && !hasVectorizer(collection)) {
          throw new Error("hybrid search with alpha > 0 requires a vectorizer or a query vector");
        }
        return this.keyword(collection, query.query, query.limit);
      case "near-vector":
        return this.nearVector(collection, query.vector, query.limit, query.targetVector);
      case "near-text":
        if (!hasVectorizer(collection)) {
          throw new Error("near-text requires a vectorizer");
        }
        return this.keyword(collection, query.query, query.limit).map((hit) => ({
          id: hit.id,
          properties: hit.properties,
          certainty: hit.score,
        }));
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private enter(operation: FakeOperation): void {
    this.calls.push(operation);
    const failure = this.failures.get(operation);
    if (failure) throw failure;
  }

  private visible(name: string): FakeCollection {
    const collection = this.blind ? undefined : this.collections.get(name);
    if (!collection) throw new Error(`could not find collection ${name}`);
    return collection;
  }

  private keyword(collection: FakeCollection, query: string, limit: number): TypedHit[] {
    const wanted = terms(query);
    if (wanted.length === 0) return [];
    return collection.objects
      .map((object) => {
        const found = new Set(terms(String(object.properties.content ?? "")));
        const matched = wanted.filter((term) => found.has(term)).length;
        return { object, score: matched / wanted.length };
      })
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(({ object, score }) => ({ id: object.id, properties: { ...object.properties }, score }));
  }

  private nearVector(
    collection: FakeCollection,
    vector: number[],
    limit: number,
    targetVector?: string
  ): TypedHit[] {
    const hits: TypedHit[] = [];
    for (const object of collection.objects) {
      const stored = Array.isArray(object.vectors)
        ? targetVector
          ? undefined
          : object.vectors
        : targetVector
          ? object.vectors?.[targetVector]
          : undefined;
      if (!stored) continue;
      const similarity = cosine(vector, stored);
      hits.push({ id: object.id, properties: { ...object.properties }, distance: 1 - similarity });
    }
    if (hits.length === 0 && collection.objects.length > 0) {
      throw new Error(targetVector ? `no vector named ${targetVector}` : "no default vector");
    }
    return hits.sort((a, b) => (a.distance ?? 1) - (b.distance ?? 1)).slice(0, limit);
  }
}
