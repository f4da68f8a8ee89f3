/**
 * search-engine.ts - Tiered fallback search
 *
 * What this file does:
 * Runs an ordered list of search strategies and returns the first
 * non-empty result set (after filters). Over the typed client:
 *
 * 1. hybrid       - keyword + vector blend; a local query vector when
 *                   client vectors are enabled
 * 2. near-vector  - local query vector only; default slot, then `content`
 * 3. near-text    - server-side vectorizer; default slot, then `content`
 * 4. keyword      - hybrid at alpha 0 (pure keyword), then BM25
 *
 * When the typed client cannot reach the collection (it does not see it,
 * or every typed tier failed), one REST GraphQL tier runs instead.
 *
 * A failing strategy is logged and counts as empty. Running out of
 * strategies returns [], never an error.
 */

import type { Logger } from "../logger";
import { describeError } from "../errors";
import type { CollectionManager } from "../vectorstore/collection-manager";
import type { SchemaReconciler } from "../vectorstore/reconciler";
import type { QueryVectorizer } from "../vectorstore/query-vectorizer";
import { hasNamedContentVector } from "../vectorstore/schema";
import type { TypedHit, TypedQuery, TypedStoreClient } from "../vectorstore/typed-client";
import {
  CONTENT_VECTOR,
  type CollectionSchema,
  type ScalarValue,
  type SearchResult,
  type SearchStrategyName,
} from "../vectorstore/types";
import type { GraphQLSearch } from "./graphql-search";
import { applyFilters, fromHybridHits, fromKeywordHits, fromVectorHits } from "./results";

export interface SearchEngineOptions {
  logger: Logger;
  useClientVectors: boolean;
  queryModelName: string;
  primaryTextProp?: string;
}

export interface SearchRequest {
  storageName: string;
  query: string;
  limit: number;
  alpha: number;
  filters?: Record<string, ScalarValue>;
}

/** Per-call state shared by the strategies; loaded on first use. */
interface SearchContext extends SearchRequest {
  /** Limit sent to the server; larger than `limit` when filtering client-side */
  fetchLimit: number;
  schema(): Promise<CollectionSchema | null>;
  queryVector(): Promise<number[] | null>;
}

interface Strategy {
  name: SearchStrategyName;
  run(context: SearchContext): Promise<SearchResult[]>;
}

/** Over-fetch factor when filters are applied after the query. */
const FILTER_FETCH_FACTOR = 4;

function memo<T>(load: () => Promise<T>): () => Promise<T> {
  let value: Promise<T> | undefined;
  return () => (value ??= load());
}

export class SearchEngine {
  private readonly log: Logger;
  private readonly typedStrategies: Strategy[];

  constructor(
    private readonly typed: TypedStoreClient | null,
    private readonly manager: CollectionManager,
    private readonly reconciler: SchemaReconciler,
    private readonly graphql: GraphQLSearch,
    private readonly vectorizer: QueryVectorizer | null,
    private readonly options: SearchEngineOptions
  ) {
    this.log = options.logger.child({ component: "search" });
    this.typedStrategies = [
      { name: "hybrid", run: (context) => this.hybrid(context) },
      ...(options.useClientVectors
        ? [{ name: "near-vector" as const, run: (context: SearchContext) => this.nearVector(context) }]
        : []),
      { name: "near-text", run: (context) => this.nearText(context) },
      { name: "keyword", run: (context) => this.keyword(context) },
    ];
  }

  async search(request: SearchRequest): Promise<SearchResult[]> {
    const hasFilters = Object.keys(request.filters ?? {}).length > 0;
    const context: SearchContext = {
      ...request,
      fetchLimit: hasFilters ? request.limit * FILTER_FETCH_FACTOR : request.limit,
      schema: memo(() => this.manager.schemaFor(request.storageName)),
      queryVector: memo(() => this.encodeQuery(request.query)),
    };

    if (this.typed && (await this.reconciler.typedVisible(request.storageName))) {
      const outcome = await this.runStrategies(this.typedStrategies, context);
      if (outcome.results) return outcome.results;
      if (outcome.answered) return [];
      this.log.warn({ collection: request.storageName }, "every typed strategy failed; trying GraphQL");
    }

    const outcome = await this.runStrategies([this.graphqlStrategy()], context);
    return outcome.results ?? [];
  }

  /**
   * First non-empty filtered result set. `answered` is true when at least
   * one strategy ran without throwing.
   */
  private async runStrategies(
    strategies: Strategy[],
    context: SearchContext
  ): Promise<{ results: SearchResult[] | null; answered: boolean }> {
    let answered = false;
    for (const strategy of strategies) {
      let results: SearchResult[];
      try {
        results = await strategy.run(context);
        answered = true;
      } catch (error) {
        this.log.warn(
          { collection: context.storageName, strategy: strategy.name, err: describeError(error) },
          "search strategy failed"
        );
        continue;
      }

      const filtered = applyFilters(results, context.filters).slice(0, context.limit);
      if (filtered.length > 0) {
        this.log.debug(
          { collection: context.storageName, strategy: strategy.name, count: filtered.length },
          "search answered"
        );
        return { results: filtered, answered };
      }
    }
    return { results: null, answered };
  }

  // -------------------------------------------------------------------------
  // Typed strategies
  // -------------------------------------------------------------------------

  private async hybrid(context: SearchContext): Promise<SearchResult[]> {
    const vector = this.options.useClientVectors ? await context.queryVector() : null;
    const targetVector = hasNamedContentVector(await context.schema()) ? CONTENT_VECTOR : undefined;
    const hits = await this.query(context, {
      kind: "hybrid",
      query: context.query,
      alpha: context.alpha,
      limit: context.fetchLimit,
      vector: vector ?? undefined,
      targetVector,
    });
    return fromHybridHits(hits);
  }

  private async nearVector(context: SearchContext): Promise<SearchResult[]> {
    const vector = await context.queryVector();
    if (!vector) return [];
    const hits = await this.firstSlot(context, (targetVector) => ({
      kind: "near-vector",
      vector,
      limit: context.fetchLimit,
      targetVector,
    }));
    return fromVectorHits(hits, "near-vector");
  }

  private async nearText(context: SearchContext): Promise<SearchResult[]> {
    const hits = await this.firstSlot(context, (targetVector) => ({
      kind: "near-text",
      query: context.query,
      limit: context.fetchLimit,
      targetVector,
    }));
    return fromVectorHits(hits, "near-text");
  }

  /** Hybrid with all weight on keywords; BM25 when that fails or is empty. */
  private async keyword(context: SearchContext): Promise<SearchResult[]> {
    try {
      const hits = await this.query(context, {
        kind: "hybrid",
        query: context.query,
        alpha: 0,
        limit: context.fetchLimit,
      });
      if (hits.length > 0) return fromKeywordHits(hits, "keyword");
    } catch (error) {
      this.log.debug({ collection: context.storageName, err: describeError(error) }, "keyword hybrid failed");
    }

    const hits = await this.query(context, {
      kind: "bm25",
      query: context.query,
      limit: context.fetchLimit,
    });
    return fromKeywordHits(hits, "keyword");
  }

  /**
   * Runs a vector query on the default slot, then on the named `content`
   * slot. Throws only when both attempts threw.
   */
  private async firstSlot(
    context: SearchContext,
    build: (targetVector: string | undefined) => TypedQuery
  ): Promise<TypedHit[]> {
    let answered = false;
    let lastError: unknown;
    for (const targetVector of [undefined, CONTENT_VECTOR]) {
      try {
        const hits = await this.query(context, build(targetVector));
        if (hits.length > 0) return hits;
        answered = true;
      } catch (error) {
        lastError = error;
      }
    }
    if (!answered) throw lastError;
    return [];
  }

  private query(context: SearchContext, query: TypedQuery): Promise<TypedHit[]> {
    if (!this.typed) return Promise.resolve([]);
    return this.typed.query(context.storageName, query);
  }

  // -------------------------------------------------------------------------
  // REST fallback
  // -------------------------------------------------------------------------

  private graphqlStrategy(): Strategy {
    return {
      name: "graphql",
      run: async (context) =>
        this.graphql.search({
          storageName: context.storageName,
          query: context.query,
          limit: context.fetchLimit,
          alpha: context.alpha,
          schema: await context.schema(),
          textProperty: this.options.primaryTextProp,
        }),
    };
  }

  private async encodeQuery(query: string): Promise<number[] | null> {
    if (!this.options.useClientVectors || !this.vectorizer) return null;
    return this.vectorizer.encode(query, this.options.queryModelName);
  }
}
