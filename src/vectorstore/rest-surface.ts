/**
 * rest-surface.ts - Raw HTTP operations against the REST API
 *
 * What this file does:
 * Every REST call the other components make: schema listing (v1 and v2),
 * class schema reads, collection creation on both wire schemas, bulk
 * insertion, GraphQL queries and deletes.
 *
 * Each call is tried under the discovered path prefix first and at the
 * root second; a 404 or a failed connection moves on to the next URL.
 * Nothing here throws on HTTP status. Listing and schema reads return null
 * when no surface answered, so callers can tell "absent" from "unknown".
 */

import type { Logger } from "../logger";
import { describeError } from "../errors";
import type { ApiVersion } from "../endpoint/resolver";
import type { HttpMethod, HttpResponse, RequestOptions } from "../transport/http-transport";
import { asArray, asNumber, asString, field, isRecord } from "../utils/json";
import {
  parseCollectionSchema,
  parseV1ClassNames,
  parseV2CollectionNames,
  toV1ClassPayload,
} from "./schema";
import type { CollectionDefinition, CollectionSchema, StorageObject } from "./types";

export interface RestTransport {
  request(method: HttpMethod, url: string, options?: RequestOptions): Promise<HttpResponse>;
}

/** Where REST paths live; implemented by EndpointResolver. */
export interface EndpointSource {
  candidateUrls(path: string): Promise<string[]>;
  detectApiVersion(): Promise<ApiVersion>;
}

export interface RestSurfaceOptions {
  logger: Logger;
  /** Never call the v2 collections API */
  skipV2: boolean;
}

export interface RestBatchResult {
  /** HTTP status, or null when no URL answered */
  status: number | null;
  succeeded: number;
  errors: string[];
}

export interface GraphQLResult {
  data: unknown;
  errors: string[];
}

/** Statuses that mean "the collection exists now". */
const CREATE_OK = new Set([200, 201, 409]);

function isAlreadyExists(response: HttpResponse): boolean {
  return /already (exists|used)/i.test(response.text);
}

function created(response: HttpResponse | null): boolean {
  if (!response) return false;
  return (
    CREATE_OK.has(response.status) ||
    (response.status === 422 && isAlreadyExists(response))
  );
}

function is2xx(status: number): boolean {
  return status >= 200 && status < 300;
}

export class RestSurface {
  private readonly log: Logger;

  constructor(
    private readonly transport: RestTransport,
    private readonly endpoint: EndpointSource,
    private readonly options: RestSurfaceOptions
  ) {
    this.log = options.logger.child({ component: "rest" });
  }

  // -------------------------------------------------------------------------
  // Listing and schema
  // -------------------------------------------------------------------------

  /** Class names from `GET /v1/schema`, or null when unreachable. */
  async listV1(): Promise<string[] | null> {
    const response = await this.send("GET", "/v1/schema");
    if (!response || response.status !== 200) return null;
    return parseV1ClassNames(response.data);
  }

  /** Collection names from `GET /v2/collections`; null on v1 servers. */
  async listV2(): Promise<string[] | null> {
    if (!(await this.v2Enabled())) return null;
    const response = await this.send("GET", "/v2/collections");
    if (!response || response.status !== 200) return null;
    return parseV2CollectionNames(response.data);
  }

  /** Class schema from v1, or from v2 when v1 has nothing. */
  async getSchema(storageName: string): Promise<CollectionSchema | null> {
    const v1 = await this.send("GET", `/v1/schema/${encodeURIComponent(storageName)}`);
    if (v1?.status === 200) {
      const schema = parseCollectionSchema(v1.data);
      if (schema) return schema;
    }

    if (!(await this.v2Enabled())) return null;
    const v2 = await this.send("GET", `/v2/collections/${encodeURIComponent(storageName)}`);
    return v2?.status === 200 ? parseCollectionSchema(v2.data) : null;
  }

  // -------------------------------------------------------------------------
  // Create / delete
  // -------------------------------------------------------------------------

  /** `POST /v2/collections`; only attempted on v2 servers. */
  async createV2(definition: CollectionDefinition): Promise<boolean> {
    if (!(await this.v2Enabled())) return false;

    const response = await this.send("POST", "/v2/collections", {
      name: definition.name,
      description: definition.description,
    });
    if (response && CREATE_OK.has(response.status)) {
      this.log.info({ collection: definition.name, status: response.status }, "created via v2");
      return true;
    }
    this.log.warn(
      { collection: definition.name, status: response?.status, body: response?.text },
      "v2 create failed"
    );
    return false;
  }

  /**
   * v1 class creation.
   *
   * `POST /v1/schema`; on 405 the class is checked for first, then
   * `POST /v1/schema/classes`, then `PUT /v1/schema/{Class}`. A 422 that
   * is not "already exists" is retried once with object properties
   * written as text.
   */
  async createV1(definition: CollectionDefinition): Promise<boolean> {
    const response = await this.upsertClass("POST", "/v1/schema", definition);
    if (created(response)) {
      this.log.info({ collection: definition.name, status: response?.status }, "created via v1");
      return true;
    }
    if (response?.status !== 405) {
      this.log.warn(
        { collection: definition.name, status: response?.status, body: response?.text },
        "v1 create failed"
      );
      return false;
    }

    this.log.warn({ collection: definition.name }, "v1 create not allowed; trying alternates");
    const listed = await this.listV1();
    if (listed?.includes(definition.name)) return true;

    const alternate = await this.upsertClass("POST", "/v1/schema/classes", definition);
    if (created(alternate)) return true;

    const put = await this.upsertClass(
      "PUT",
      `/v1/schema/${encodeURIComponent(definition.name)}`,
      definition
    );
    if (created(put)) return true;

    this.log.warn(
      { collection: definition.name, status: put?.status, body: put?.text },
      "v1 alternate create failed"
    );
    return false;
  }

  /** `DELETE /v1/schema/{Class}`; a 404 counts as already gone. */
  async deleteClass(storageName: string): Promise<boolean> {
    const response = await this.send("DELETE", `/v1/schema/${encodeURIComponent(storageName)}`);
    return response !== null && (is2xx(response.status) || response.status === 404);
  }

  // -------------------------------------------------------------------------
  // Data
  // -------------------------------------------------------------------------

  /**
   * `POST /v1/batch/objects` for one chunk.
   *
   * Reads per-object outcomes when the response carries them (an array of
   * objects with `result.errors`, or `results.objects[].status`); otherwise
   * a 2xx counts the whole chunk as accepted.
   */
  async batchInsert(storageName: string, objects: StorageObject[]): Promise<RestBatchResult> {
    const body = {
      objects: objects.map((object) => {
        const vectors = object.vectors;
        if (vectors === undefined) {
          return { class: storageName, properties: object.properties };
        }
        return Array.isArray(vectors)
          ? { class: storageName, properties: object.properties, vector: vectors }
          : { class: storageName, properties: object.properties, vectors };
      }),
    };

    let response: HttpResponse;
    try {
      response = await this.sendOrThrow("POST", "/v1/batch/objects", body);
    } catch (error) {
      return { status: null, succeeded: 0, errors: [describeError(error)] };
    }

    if (!is2xx(response.status)) {
      return {
        status: response.status,
        succeeded: 0,
        errors: [`batch returned ${response.status}: ${response.text.slice(0, 200)}`],
      };
    }

    return { status: response.status, ...countBatchOutcomes(response.data, objects.length) };
  }

  /** `POST /v1/graphql`; null when unreachable or rejected. */
  async graphql(query: string): Promise<GraphQLResult | null> {
    const response = await this.send("POST", "/v1/graphql", { query });
    if (!response || !is2xx(response.status)) return null;

    const errors = asArray(field(response.data, "errors"))
      .map((entry) => asString(field(entry, "message")) ?? JSON.stringify(entry));
    return { data: field(response.data, "data"), errors };
  }

  /** Object count via `Aggregate { Class { meta { count } } }`. */
  async count(storageName: string): Promise<number | null> {
    const result = await this.graphql(`{ Aggregate { ${storageName} { meta { count } } } }`);
    if (!result) return null;
    const rows = asArray(field(result.data, "Aggregate", storageName));
    return asNumber(field(rows[0], "meta", "count")) ?? null;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async v2Enabled(): Promise<boolean> {
    if (this.options.skipV2) return false;
    return (await this.endpoint.detectApiVersion()) === "v2";
  }

  private async upsertClass(
    method: HttpMethod,
    path: string,
    definition: CollectionDefinition
  ): Promise<HttpResponse | null> {
    const response = await this.send(method, path, toV1ClassPayload(definition));
    if (response?.status !== 422 || isAlreadyExists(response)) {
      return response;
    }
    this.log.warn(
      { collection: definition.name, path },
      "class rejected (422); retrying with object properties as text"
    );
    return this.send(method, path, toV1ClassPayload(definition, true));
  }

  /** Like sendOrThrow, but logs and returns null when nothing answered. */
  private async send(
    method: HttpMethod,
    path: string,
    body?: unknown
  ): Promise<HttpResponse | null> {
    try {
      return await this.sendOrThrow(method, path, body);
    } catch (error) {
      this.log.debug({ method, path, err: describeError(error) }, "REST request failed");
      return null;
    }
  }

  /**
   * Tries each candidate URL; returns the first non-404 response, or the
   * last 404. Throws the last transport error when no URL answered.
   */
  private async sendOrThrow(
    method: HttpMethod,
    path: string,
    body?: unknown
  ): Promise<HttpResponse> {
    const urls = await this.endpoint.candidateUrls(path);
    let lastResponse: HttpResponse | null = null;
    let lastError: unknown = new Error(`no URL for ${path}`);

    for (const url of urls) {
      try {
        const response = await this.transport.request(
          method,
          url,
          body === undefined ? {} : { body }
        );
        if (response.status !== 404) return response;
        lastResponse = response;
      } catch (error) {
        lastError = error;
      }
    }

    if (lastResponse) return lastResponse;
    throw lastError;
  }
}

/** Per-object success counting for the batch response shapes Weaviate uses. */
export function countBatchOutcomes(
  data: unknown,
  sent: number
): { succeeded: number; errors: string[] } {
  if (Array.isArray(data)) {
    const errors: string[] = [];
    for (const entry of data) {
      const messages = asArray(field(entry, "result", "errors", "error"))
        .map((error) => asString(field(error, "message")))
        .filter((message): message is string => message !== undefined);
      if (messages.length > 0) errors.push(messages.join("; "));
    }
    return { succeeded: data.length - errors.length, errors };
  }

  const objects = field(data, "results", "objects");
  if (Array.isArray(objects)) {
    const errors = objects
      .filter((entry) => isRecord(entry) && asString(entry.status) !== "SUCCESS")
      .map((entry) => asString(field(entry, "errors")) ?? JSON.stringify(entry));
    return { succeeded: objects.length - errors.length, errors };
  }

  return { succeeded: sent, errors: [] };
}
