/**
 * typed-client.ts - Capability interface over the typed Weaviate client
 *
 * What this file does:
 * Defines TypedStoreClient, the operations the rest of the layer needs from
 * a typed client library, and WeaviateV3Client, the adapter for
 * weaviate-client v3. The adapter is selected once, when the connection
 * context is built; nothing else imports weaviate-client.
 *
 * The typed client keeps its own view of which collections exist, and that
 * view can lag behind REST after a create. `exists` answers from a local
 * visibility cache first; `refresh` drops the cache and reloads the listing.
 */

import weaviate, { type WeaviateClient } from "weaviate-client";
import type { Logger } from "../logger";
import { asArray, asString, isRecord } from "../utils/json";
import { isCloudHost } from "../transport/domains";
import {
  CONTENT_VECTOR,
  type CollectionDefinition,
  type CollectionSchema,
  type PropertyDefinition,
  type StorageObject,
} from "./types";

// ---------------------------------------------------------------------------
// Capability interface
// ---------------------------------------------------------------------------

export type TypedQuery =
  | {
      kind: "hybrid";
      query: string;
      alpha: number;
      limit: number;
      vector?: number[];
      targetVector?: string;
    }
  | { kind: "near-vector"; vector: number[]; limit: number; targetVector?: string }
  | { kind: "near-text"; query: string; limit: number; targetVector?: string }
  | { kind: "bm25"; query: string; limit: number };

export interface TypedHit {
  id: string;
  properties: Record<string, unknown>;
  score?: number;
  distance?: number;
  certainty?: number;
}

export interface TypedBatchResult {
  inserted: number;
  errors: string[];
}

export interface TypedStoreClient {
  /** Major version of the client library behind the adapter */
  readonly clientVersion: string;
  listCollections(): Promise<string[]>;
  exists(name: string): Promise<boolean>;
  describe(name: string): Promise<CollectionSchema | null>;
  /** Throws when the server rejects the definition, including "already exists" */
  create(definition: CollectionDefinition): Promise<void>;
  delete(name: string): Promise<void>;
  /** Drops cached visibility and reloads the collection listing */
  refresh(): Promise<void>;
  count(name: string): Promise<number>;
  insertMany(name: string, objects: StorageObject[]): Promise<TypedBatchResult>;
  query(name: string, query: TypedQuery): Promise<TypedHit[]>;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// weaviate-client v3 adapter
// ---------------------------------------------------------------------------

interface QueryObject {
  uuid: string;
  properties: Record<string, unknown>;
  metadata?: { score?: number; distance?: number; certainty?: number };
}

function toHits(result: { objects: QueryObject[] }): TypedHit[] {
  return result.objects.map((object) => ({
    id: object.uuid,
    properties: { ...object.properties },
    score: object.metadata?.score,
    distance: object.metadata?.distance,
    certainty: object.metadata?.certainty,
  }));
}

function toPropertyConfig(property: PropertyDefinition) {
  return {
    name: property.name,
    dataType: property.dataType,
    ...(property.nestedProperties && {
      nestedProperties: property.nestedProperties.map((nested) => ({
        name: nested.name,
        dataType: nested.dataType,
      })),
    }),
  };
}

/**
 * Reads a typed-client collection config into a CollectionSchema.
 * Vector slots appear under `vectorizers` (or `vectors`); the unnamed
 * default slot is reported as "default" and is not a named vector.
 */
export function schemaFromTypedConfig(config: unknown): CollectionSchema | null {
  if (!isRecord(config)) return null;
  const name = asString(config.name);
  if (!name) return null;

  const properties: Record<string, string> = {};
  for (const entry of asArray(config.properties)) {
    if (!isRecord(entry)) continue;
    const propName = asString(entry.name);
    if (propName) properties[propName] = asString(entry.dataType) ?? "text";
  }

  const slots = isRecord(config.vectorizers)
    ? config.vectorizers
    : isRecord(config.vectors)
      ? config.vectors
      : {};
  const namedVectors = Object.keys(slots).filter((slot) => slot !== "default");

  return { name, properties, namedVectors };
}

export class WeaviateV3Client implements TypedStoreClient {
  readonly clientVersion = "v3";
  private readonly visible = new Set<string>();
  private readonly log: Logger;

  constructor(
    private readonly client: WeaviateClient,
    logger: Logger
  ) {
    this.log = logger.child({ component: "typed-client" });
  }

  async listCollections(): Promise<string[]> {
    const configs = await this.client.collections.listAll();
    const names = configs.map((config) => config.name);
    for (const name of names) this.visible.add(name);
    return names;
  }

  async exists(name: string): Promise<boolean> {
    if (this.visible.has(name)) return true;
    const found = await this.client.collections.exists(name);
    if (found) this.visible.add(name);
    return found;
  }

  async describe(name: string): Promise<CollectionSchema | null> {
    const config = await this.client.collections.get(name).config.get();
    return schemaFromTypedConfig(config);
  }

  async create(definition: CollectionDefinition): Promise<void> {
    const properties = definition.properties.map(toPropertyConfig);
    const { configure } = weaviate;

    if (definition.vectorMode === "server") {
      await this.client.collections.create({
        name: definition.name,
        description: definition.description,
        properties,
        vectorizers: configure.vectorizer.text2VecOpenAI({
          name: CONTENT_VECTOR,
          sourceProperties: ["content"],
        }),
      });
    } else if (definition.vectorMode === "named") {
      await this.client.collections.create({
        name: definition.name,
        description: definition.description,
        properties,
        vectorizers: configure.vectorizer.none({ name: CONTENT_VECTOR }),
      });
    } else {
      await this.client.collections.create({
        name: definition.name,
        description: definition.description,
        properties,
      });
    }
    this.visible.add(definition.name);
  }

  async delete(name: string): Promise<void> {
    await this.client.collections.delete(name);
    this.visible.delete(name);
  }

  async refresh(): Promise<void> {
    this.visible.clear();
    const names = await this.listCollections();
    this.log.debug({ count: names.length }, "refreshed collection listing");
  }

  async count(name: string): Promise<number> {
    const result = await this.client.collections.get(name).aggregate.overAll();
    return result.totalCount;
  }

  async insertMany(name: string, objects: StorageObject[]): Promise<TypedBatchResult> {
    const result = await this.client.collections.get(name).data.insertMany(
      objects.map((object) => ({
        properties: object.properties,
        vectors: object.vectors,
      }))
    );
    const errors = Object.values(result.errors).map((error) => error.message);
    return { inserted: objects.length - errors.length, errors };
  }

  async query(name: string, request: TypedQuery): Promise<TypedHit[]> {
    const query = this.client.collections.get(name).query;

    switch (request.kind) {
      case "hybrid":
        return toHits(
          await query.hybrid(request.query, {
            alpha: request.alpha,
            limit: request.limit,
            vector: request.vector,
            targetVector: request.targetVector,
            returnMetadata: ["score"],
          })
        );
      case "near-vector":
        return toHits(
          await query.nearVector(request.vector, {
            limit: request.limit,
            targetVector: request.targetVector,
            returnMetadata: ["distance", "certainty"],
          })
        );
      case "near-text":
        return toHits(
          await query.nearText(request.query, {
            limit: request.limit,
            targetVector: request.targetVector,
            returnMetadata: ["distance", "certainty"],
          })
        );
      case "bm25":
        return toHits(
          await query.bm25(request.query, {
            limit: request.limit,
            returnMetadata: ["score"],
          })
        );
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

// ---------------------------------------------------------------------------
// Connection
// ---------------------------------------------------------------------------

export interface TypedConnectOptions {
  baseUrl: string;
  apiKey?: string;
  openaiApiKey?: string;
  /** host[:port] or URL of the gRPC endpoint; defaults to the HTTP host */
  grpcUrl?: string;
  grpcPort: number;
  logger: Logger;
}

export type TypedClientFactory = (options: TypedConnectOptions) => Promise<TypedStoreClient>;

interface GrpcTarget {
  host: string;
  port?: number;
  secure: boolean;
}

/** Accepts `host`, `host:port` or `scheme://host:port`. */
export function parseGrpcTarget(raw: string, secureDefault: boolean): GrpcTarget | null {
  const match = /^(?:([a-z]+):\/\/)?([^/:]+)(?::(\d+))?/i.exec(raw.trim());
  if (!match) return null;
  const [, scheme, host, port] = match;
  return {
    host,
    port: port ? Number(port) : undefined,
    secure: scheme ? /^(https|grpcs)$/i.test(scheme) : secureDefault,
  };
}

/**
 * Connects weaviate-client v3: the cloud helper for hosted clusters, a
 * custom connection (HTTP host plus gRPC host/port) for everything else.
 */
export const connectWeaviateV3: TypedClientFactory = async (options) => {
  const url = new URL(options.baseUrl);
  const secure = url.protocol === "https:";
  const authCredentials = options.apiKey ? new weaviate.ApiKey(options.apiKey) : undefined;
  const headers: Record<string, string> = options.openaiApiKey
    ? { "X-OpenAI-Api-Key": options.openaiApiKey }
    : {};

  let client: WeaviateClient;
  if (isCloudHost(url.hostname)) {
    client = await weaviate.connectToWeaviateCloud(options.baseUrl, {
      authCredentials,
      headers,
    });
  } else {
    const grpc = options.grpcUrl ? parseGrpcTarget(options.grpcUrl, secure) : null;
    client = await weaviate.connectToCustom({
      httpHost: url.hostname,
      httpPort: url.port ? Number(url.port) : secure ? 443 : 80,
      httpSecure: secure,
      grpcHost: grpc?.host ?? url.hostname,
      grpcPort: grpc?.port ?? options.grpcPort,
      grpcSecure: grpc?.secure ?? secure,
      authCredentials,
      headers,
    });
  }

  options.logger.info({ url: options.baseUrl }, "typed client connected");
  return new WeaviateV3Client(client, options.logger);
};
