/**
 * documents.ts - Document Record to Storage Object mapping
 *
 * Pure functions, no I/O. Each record becomes the standard properties plus
 * page, section and extra properties, then is filtered to what the target
 * collection's schema declares. Unknown properties are dropped, not
 * rejected: the batch endpoint fails a whole object on one unknown field.
 *
 * Metadata is only written when enabled, because producers disagree about
 * its shape more than about anything else. It is stored as JSON, wrapped
 * in `{ kv }` when the schema declares `metadata` as an object.
 */

import { CONTENT_VECTOR } from "../vectorstore/types";
import type {
  CollectionSchema,
  DocumentRecord,
  StorageObject,
  StorageProperties,
  StorageValue,
} from "../vectorstore/types";
import { hasNamedContentVector } from "../vectorstore/schema";

export interface TransformOptions {
  includeMetadata: boolean;
  /** Timestamp written to `created_at` */
  now: Date;
}

export interface TransformResult {
  objects: StorageObject[];
  /** Property names removed because the schema does not declare them */
  dropped: string[];
}

function metadataValue(
  metadata: DocumentRecord["metadata"],
  schema: CollectionSchema | null
): StorageValue | undefined {
  if (!metadata || Object.keys(metadata).length === 0) return undefined;
  const json = JSON.stringify(metadata);
  const declared = schema?.properties.metadata;
  return declared === undefined || declared === "object" ? { kv: json } : json;
}

/** Standard and extra properties for one record, before filtering. */
export function buildProperties(
  record: DocumentRecord,
  schema: CollectionSchema | null,
  options: TransformOptions
): StorageProperties {
  const { metadata: extraMetadata, ...extra } = record.properties ?? {};
  const properties: StorageProperties = {
    ...extra,
    // metadata passed as an extra property is still subject to includeMetadata
    ...(options.includeMetadata && extraMetadata !== undefined ? { metadata: extraMetadata } : {}),
    content: record.content,
    source: record.source ?? "unknown",
    source_type: record.sourceType ?? "document",
    created_at: options.now.toISOString(),
  };
  if (record.page !== undefined) properties.page = record.page;
  if (record.section !== undefined) properties.section = record.section;

  if (options.includeMetadata) {
    const metadata = metadataValue(record.metadata, schema);
    if (metadata !== undefined) properties.metadata = metadata;
  }
  return properties;
}

/**
 * Vectors as the schema can take them. A single default vector moves to the
 * named `content` slot only when the collection declares that slot.
 */
export function buildVectors(
  record: DocumentRecord,
  schema: CollectionSchema | null
): StorageObject["vectors"] {
  const named = record.vectors && Object.keys(record.vectors).length > 0 ? record.vectors : undefined;

  if (record.vector && hasNamedContentVector(schema)) {
    return { [CONTENT_VECTOR]: record.vector, ...named };
  }
  return named ?? record.vector;
}

/**
 * Maps records to storage objects for one collection.
 *
 * A schema with no properties (or none at all) means the server will infer
 * the schema, so nothing is filtered.
 */
export function toStorageObjects(
  records: DocumentRecord[],
  schema: CollectionSchema | null,
  options: TransformOptions
): TransformResult {
  const known = schema ? new Set(Object.keys(schema.properties)) : new Set<string>();
  const filter = known.size > 0;
  const dropped = new Set<string>();

  const objects = records.map((record) => {
    const all = buildProperties(record, schema, options);
    const properties: StorageProperties = {};
    for (const [name, value] of Object.entries(all)) {
      if (!filter || known.has(name)) {
        properties[name] = value;
      } else {
        dropped.add(name);
      }
    }

    const vectors = buildVectors(record, schema);
    return vectors === undefined ? { properties } : { properties, vectors };
  });

  return { objects, dropped: [...dropped] };
}
