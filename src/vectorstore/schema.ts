/**
 * schema.ts - Collection schema building and parsing
 *
 * Pure functions shared by the collection manager, ingestion and search:
 * the standard property schema every collection gets, the v1 REST class
 * payload, and parsers for the two REST schema shapes (v1 classes and v2
 * collections) into one CollectionSchema.
 */

import { asArray, asString, isRecord } from "../utils/json";
import {
  CONTENT_VECTOR,
  type CollectionDefinition,
  type CollectionSchema,
  type PropertyDefinition,
  type PropertyType,
  type SchemaHint,
  type VectorMode,
} from "./types";

/**
 * Properties every collection is created with. `metadata` is an object
 * with a single text field holding the caller's metadata as JSON.
 */
export const STANDARD_PROPERTIES: PropertyDefinition[] = [
  { name: "content", dataType: "text" },
  { name: "source", dataType: "text" },
  { name: "source_type", dataType: "text" },
  { name: "created_at", dataType: "date" },
  { name: "page", dataType: "int" },
  { name: "section", dataType: "text" },
  {
    name: "metadata",
    dataType: "object",
    nestedProperties: [{ name: "kv", dataType: "text" }],
  },
];

const PROPERTY_TYPES: Record<string, PropertyType> = {
  text: "text",
  string: "text",
  date: "date",
  int: "int",
  integer: "int",
  number: "number",
  float: "number",
  boolean: "boolean",
  bool: "boolean",
  object: "object",
};

/** Maps a hint's free-form type name; anything unknown becomes text. */
export function hintPropertyType(type: string): PropertyType {
  return PROPERTY_TYPES[type.trim().toLowerCase()] ?? "text";
}

export interface VectorModeOptions {
  openaiApiKey?: string;
  useClientVectors: boolean;
}

/**
 * Server-side vectorization when an OpenAI key is available and client
 * vectors are off; otherwise a self-provided named `content` vector.
 */
export function chooseVectorMode(options: VectorModeOptions): VectorMode {
  return options.openaiApiKey && !options.useClientVectors ? "server" : "named";
}

export function buildCollectionDefinition(
  storageName: string,
  hint: SchemaHint | undefined,
  vectorMode: VectorMode
): CollectionDefinition {
  const properties = [...STANDARD_PROPERTIES];
  const known = new Set(properties.map((p) => p.name));

  for (const [name, type] of Object.entries(hint?.properties ?? {})) {
    if (known.has(name)) continue;
    known.add(name);
    const dataType = hintPropertyType(type);
    properties.push(
      dataType === "object"
        ? { name, dataType, nestedProperties: [{ name: "kv", dataType: "text" }] }
        : { name, dataType }
    );
  }

  return {
    name: storageName,
    description: hint?.description ?? `Document collection ${storageName}`,
    properties,
    vectorMode,
  };
}

/**
 * The v1 `POST /v1/schema` class payload.
 *
 * @param coerceObjects - write `object` properties as `text`, for servers
 *   that reject nested properties with a 422
 */
export function toV1ClassPayload(
  definition: CollectionDefinition,
  coerceObjects = false
): Record<string, unknown> {
  return {
    class: definition.name,
    description: definition.description,
    vectorizer: definition.vectorMode === "server" ? "text2vec-openai" : "none",
    properties: definition.properties.map((property) => {
      if (property.dataType === "object" && coerceObjects) {
        return { name: property.name, dataType: ["text"] };
      }
      return {
        name: property.name,
        dataType: [property.dataType],
        ...(property.nestedProperties && {
          nestedProperties: property.nestedProperties.map((nested) => ({
            name: nested.name,
            dataType: [nested.dataType],
          })),
        }),
      };
    }),
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Class names from a `GET /v1/schema` body: `{ classes: [{ class }] }`. */
export function parseV1ClassNames(data: unknown): string[] | null {
  if (!isRecord(data)) return null;
  return asArray(data.classes)
    .map((entry) => (isRecord(entry) ? asString(entry.class) ?? asString(entry.name) : undefined))
    .filter((name): name is string => name !== undefined);
}

/** Collection names from a `GET /v2/collections` body: `{ collections: [{ name }] }`. */
export function parseV2CollectionNames(data: unknown): string[] | null {
  const entries = Array.isArray(data) ? data : isRecord(data) ? data.collections : undefined;
  if (!Array.isArray(entries)) return null;
  return entries
    .map((entry) =>
      typeof entry === "string" ? entry : isRecord(entry) ? asString(entry.name) : undefined
    )
    .filter((name): name is string => name !== undefined);
}

function propertyTypes(properties: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  for (const entry of asArray(properties)) {
    if (!isRecord(entry)) continue;
    const name = asString(entry.name);
    if (!name) continue;
    const rawType = entry.dataType ?? entry.data_type;
    const type = Array.isArray(rawType) ? asString(rawType[0]) : asString(rawType);
    result[name] = type ?? "text";
  }
  return result;
}

function vectorNames(data: Record<string, unknown>): string[] {
  const names = new Set<string>();
  for (const entry of asArray(data.vectors)) {
    const name = isRecord(entry) ? asString(entry.name) : undefined;
    if (name) names.add(name);
  }
  for (const key of ["vectorConfig", "vector_config", "namedVectors"]) {
    const config = data[key];
    if (isRecord(config)) {
      for (const name of Object.keys(config)) names.add(name);
    }
  }
  return [...names];
}

/** A `GET /v1/schema/{Class}` or `GET /v2/collections/{Class}` body. */
export function parseCollectionSchema(data: unknown): CollectionSchema | null {
  if (!isRecord(data)) return null;
  const name = asString(data.class) ?? asString(data.name);
  if (!name) return null;

  return {
    name,
    properties: propertyTypes(data.properties),
    namedVectors: vectorNames(data),
    vectorizer: asString(data.vectorizer),
  };
}

export function hasNamedContentVector(schema: CollectionSchema | null): boolean {
  return schema?.namedVectors.includes(CONTENT_VECTOR) ?? false;
}

const TEXT_TYPES = new Set(["text", "string"]);

/**
 * Property searched by keyword queries: the override when given, `content`
 * when it is text-typed, else the first text property, else `content`.
 */
export function primaryTextProperty(
  schema: CollectionSchema | null,
  override?: string
): string {
  if (override) return override;
  if (!schema) return "content";

  const contentType = schema.properties.content;
  if (contentType && TEXT_TYPES.has(contentType)) return "content";

  const firstText = Object.entries(schema.properties).find(([, type]) => TEXT_TYPES.has(type));
  return firstText ? firstText[0] : "content";
}
