/**
 * query-vectorizer.ts - Text to query vector, for client-vector collections
 *
 * Loads an embedding function by model name on first use and keeps it
 * until a different name is asked for. Concurrent callers share one load.
 * Any failure returns null, so search falls through to a keyword tier
 * instead of failing.
 */

import type { Logger } from "../logger";
import { describeError } from "../errors";
import { VoyageEmbedding } from "./embeddings";
import type { EmbeddingFunction } from "./types";

export type EmbeddingLoader = (modelName: string) => Promise<EmbeddingFunction>;

/** Loads Voyage AI models; the key comes from VOYAGE_API_KEY. */
export const loadVoyageEmbedding: EmbeddingLoader = async (modelName) =>
  new VoyageEmbedding({ model: modelName });

export class QueryVectorizer {
  private readonly log: Logger;
  private loaded: { modelName: string; model: Promise<EmbeddingFunction> } | null = null;

  constructor(
    private readonly defaultModel: string,
    logger: Logger,
    private readonly loader: EmbeddingLoader = loadVoyageEmbedding
  ) {
    this.log = logger.child({ component: "query-vectorizer" });
  }

  async encode(text: string, modelName = this.defaultModel): Promise<number[] | null> {
    if (!this.loaded || this.loaded.modelName !== modelName) {
      this.log.debug({ model: modelName }, "loading embedding model");
      this.loaded = { modelName, model: this.loader(modelName) };
    }
    const current = this.loaded;

    let model: EmbeddingFunction;
    try {
      model = await current.model;
    } catch (error) {
      // Let the next call retry the load
      if (this.loaded === current) this.loaded = null;
      this.log.warn({ model: modelName, err: describeError(error) }, "embedding model unavailable");
      return null;
    }

    try {
      const [vector] = await model.embed([text]);
      return vector ?? null;
    } catch (error) {
      this.log.warn({ model: modelName, err: describeError(error) }, "query encoding failed");
      return null;
    }
  }
}
