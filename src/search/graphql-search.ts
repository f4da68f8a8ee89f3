/**
 * graphql-search.ts - Search over REST GraphQL
 *
 * The last tier, for collections the typed client cannot reach. Runs
 * `Get` queries against `/v1/graphql` in the order bm25, hybrid, nearText
 * and returns the first non-empty answer. The keyword property is the
 * schema's primary text property unless configured.
 */

import type { Logger } from "../logger";
import type { RestSurface } from "../vectorstore/rest-surface";
import { primaryTextProperty } from "../vectorstore/schema";
import type { CollectionSchema, SearchResult } from "../vectorstore/types";
import { asArray, asNumber, asString, field, isRecord } from "../utils/json";
import { fromHybridHits, fromKeywordHits, fromVectorHits, type RawHit } from "./results";

export type GraphQLQueryKind = "bm25" | "hybrid" | "nearText";

const QUERY_ORDER: GraphQLQueryKind[] = ["bm25", "hybrid", "nearText"];

/** Scalar types that can be selected without a sub-selection. */
const SELECTABLE_TYPES = new Set(["text", "string", "int", "number", "boolean", "date", "uuid"]);

/** Caller metadata is stored as `{ kv: "<json>" }` when the property is an object. */
const METADATA_SELECTION = "metadata { kv }";

const DEFAULT_FIELDS = ["content", "source", "source_type", "page", "section", METADATA_SELECTION];

export interface GraphQLSearchRequest {
  storageName: string;
  query: string;
  limit: number;
  alpha: number;
  schema: CollectionSchema | null;
  /** Overrides the detected primary text property */
  textProperty?: string;
}

/**
 * Properties to select: the schema's scalar properties plus an object-typed
 * `metadata`, or the standard set when the schema is unknown.
 */
export function selectableFields(schema: CollectionSchema | null, textProperty: string): string[] {
  const fields = schema
    ? Object.entries(schema.properties).flatMap(([name, type]) => {
        if (SELECTABLE_TYPES.has(type)) return [name];
        return name === "metadata" && type === "object" ? [METADATA_SELECTION] : [];
      })
    : DEFAULT_FIELDS;
  return fields.includes(textProperty) ? fields : [textProperty, ...fields];
}

export function buildGetQuery(
  kind: GraphQLQueryKind,
  request: GraphQLSearchRequest,
  textProperty: string,
  fields: string[]
): string {
  const query = JSON.stringify(request.query);
  const clause =
    kind === "bm25"
      ? `bm25: { query: ${query}, properties: [${JSON.stringify(textProperty)}] }`
      : kind === "hybrid"
        ? `hybrid: { query: ${query}, alpha: ${request.alpha} }`
        : `nearText: { concepts: [${query}] }`;

  return (
    `{ Get { ${request.storageName}(${clause}, limit: ${request.limit}) ` +
    `{ ${fields.join(" ")} _additional { id score distance certainty } } } }`
  );
}

function toRawHit(row: unknown): RawHit | null {
  if (!isRecord(row)) return null;
  const { _additional: additional, ...properties } = row;
  return {
    id: asString(field(additional, "id")) ?? "",
    properties,
    score: asNumber(field(additional, "score")),
    distance: asNumber(field(additional, "distance")),
    certainty: asNumber(field(additional, "certainty")),
  };
}

export class GraphQLSearch {
  private readonly log: Logger;

  constructor(
    private readonly rest: RestSurface,
    logger: Logger
  ) {
    this.log = logger.child({ component: "graphql-search" });
  }

  async search(request: GraphQLSearchRequest): Promise<SearchResult[]> {
    const textProperty = primaryTextProperty(request.schema, request.textProperty);
    const fields = selectableFields(request.schema, textProperty);

    for (const kind of QUERY_ORDER) {
      const result = await this.rest.graphql(buildGetQuery(kind, request, textProperty, fields));
      if (!result) {
        this.log.debug({ collection: request.storageName, kind }, "GraphQL query got no answer");
        continue;
      }
      if (result.errors.length > 0) {
        this.log.debug({ collection: request.storageName, kind, errors: result.errors }, "GraphQL query rejected");
        continue;
      }

      const hits = asArray(field(result.data, "Get", request.storageName))
        .map(toRawHit)
        .filter((hit): hit is RawHit => hit !== null);
      if (hits.length === 0) continue;

      if (kind === "bm25") return fromKeywordHits(hits, "graphql", textProperty);
      if (kind === "hybrid") {
        return fromHybridHits(hits, textProperty).map((hit) => ({ ...hit, strategy: "graphql" }));
      }
      return fromVectorHits(hits, "graphql", textProperty);
    }
    return [];
  }
}
