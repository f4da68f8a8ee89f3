/**
 * results.ts - Normalizing hits into Search Results
 *
 * Every tier returns raw properties plus whatever score fields its query
 * type produces. This module turns those into SearchResult records with a
 * score in [0,1]:
 *
 * - hybrid: the server's fused score, clamped
 * - vector: certainty when present, else 1 - distance, clamped
 * - keyword: BM25 scores divided by the call's highest score
 *
 * Scores from different tiers are not comparable; each result carries the
 * strategy that produced it.
 */

import { asNumber, asString, isRecord } from "../utils/json";
import type { ScalarValue, SearchResult, SearchStrategyName } from "../vectorstore/types";

/** Properties mapped to SearchResult fields rather than metadata. */
const RESULT_FIELDS = new Set(["content", "source", "source_type", "page", "section", "created_at", "metadata"]);

export interface RawHit {
  id: string;
  properties: Record<string, unknown>;
  score?: number;
  distance?: number;
  certainty?: number;
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function vectorScore(hit: Pick<RawHit, "distance" | "certainty">): number {
  if (hit.certainty !== undefined) return clamp01(hit.certainty);
  if (hit.distance !== undefined) return clamp01(1 - hit.distance);
  return 0;
}

/** Scales scores so the best hit of the call scores 1. */
export function relativeScores(scores: number[]): number[] {
  const max = Math.max(0, ...scores);
  return scores.map((score) => (max > 0 ? clamp01(score / max) : 0));
}

/** Caller metadata, from `{ kv: "<json>" }` or a JSON string. */
export function parseMetadata(value: unknown): Record<string, unknown> {
  const json = isRecord(value) ? asString(value.kv) : asString(value);
  if (json === undefined) return {};
  try {
    const parsed: unknown = JSON.parse(json);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/**
 * Builds a SearchResult. `textProperty` names the property holding the
 * document text when it is not `content`.
 */
export function toSearchResult(
  hit: RawHit,
  score: number,
  strategy: SearchStrategyName,
  textProperty = "content"
): SearchResult {
  const { properties } = hit;
  const metadata: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(properties)) {
    if (!RESULT_FIELDS.has(name) && name !== textProperty && value !== null) {
      metadata[name] = value;
    }
  }
  Object.assign(metadata, parseMetadata(properties.metadata));

  return {
    id: hit.id,
    content: asString(properties[textProperty]) ?? asString(properties.content) ?? "",
    source: asString(properties.source) ?? "unknown",
    sourceType: asString(properties.source_type) ?? "document",
    page: asNumber(properties.page),
    section: asString(properties.section),
    metadata,
    score: clamp01(score),
    strategy,
  };
}

/** Hybrid hits: the fused score, clamped. */
export function fromHybridHits(hits: RawHit[], textProperty?: string): SearchResult[] {
  return hits.map((hit) => toSearchResult(hit, hit.score ?? 0, "hybrid", textProperty));
}

export function fromVectorHits(
  hits: RawHit[],
  strategy: "near-vector" | "near-text" | "graphql",
  textProperty?: string
): SearchResult[] {
  return hits.map((hit) => toSearchResult(hit, vectorScore(hit), strategy, textProperty));
}

export function fromKeywordHits(
  hits: RawHit[],
  strategy: "keyword" | "graphql",
  textProperty?: string
): SearchResult[] {
  const scores = relativeScores(hits.map((hit) => hit.score ?? 0));
  return hits.map((hit, index) => toSearchResult(hit, scores[index], strategy, textProperty));
}

function fieldValue(result: SearchResult, name: string): unknown {
  switch (name) {
    case "content":
      return result.content;
    case "source":
      return result.source;
    case "sourceType":
    case "source_type":
      return result.sourceType;
    case "page":
      return result.page;
    case "section":
      return result.section;
    default:
      return result.metadata[name];
  }
}

/** Keeps results whose fields or metadata equal every filter value. */
export function applyFilters(
  results: SearchResult[],
  filters: Record<string, ScalarValue> | undefined
): SearchResult[] {
  const entries = Object.entries(filters ?? {});
  if (entries.length === 0) return results;
  return results.filter((result) =>
    entries.every(([name, expected]) => fieldValue(result, name) === expected)
  );
}
