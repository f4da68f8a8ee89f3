/**
 * embeddings.ts - Voyage AI embedding implementation
 *
 * What this file does:
 * Implements the EmbeddingFunction interface using Voyage AI's embedding API.
 * This is the default model behind the query vectorizer, used when
 * collections hold client-provided vectors and queries need a vector from
 * the same model.
 *
 * How it works:
 * 1. Text strings go in (e.g., "road repair budget")
 * 2. Voyage AI's API returns one vector per string
 * 3. Similar texts produce similar vectors (close in cosine distance)
 */

import { VoyageAIClient } from "voyageai";
import { ConfigurationError } from "../errors";
import type { EmbeddingFunction } from "./types";

/**
 * Default embedding model.
 *
 * voyage-4 is Voyage AI's current-generation model with 1024 dimensions.
 * The query vectorizer passes WEAVIATE_QUERY_MODEL_NAME through here.
 */
export const DEFAULT_MODEL = "voyage-4";

/**
 * Embedding function that uses Voyage AI's API to convert text to vectors.
 *
 * Usage:
 *   const embedder = new VoyageEmbedding();  // uses VOYAGE_API_KEY env var
 *   const [vector] = await embedder.embed(["road repairs"]);
 */
export interface VoyageEmbeddingOptions {
  /** Defaults to the VOYAGE_API_KEY env var */
  apiKey?: string;
  model?: string;
  /** Voyage embeds search text and stored text differently (default: "query") */
  inputType?: "query" | "document";
}

export class VoyageEmbedding implements EmbeddingFunction {
  private readonly client: VoyageAIClient;
  readonly model: string;
  private readonly inputType: "query" | "document";

  constructor(options: VoyageEmbeddingOptions = {}) {
    const apiKey = options.apiKey ?? process.env.VOYAGE_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError(
        "Voyage AI API key is required for client-side query vectors. " +
          "Set VOYAGE_API_KEY or pass apiKey."
      );
    }

    this.client = new VoyageAIClient({ apiKey });
    this.model = options.model ?? DEFAULT_MODEL;
    this.inputType = options.inputType ?? "query";
  }

  /**
   * Embeds all texts in one request. Results are placed by the index the
   * API reports, not by response order.
   *
   * @throws Error when the response is missing a vector for any input
   */
  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.embed({
      input: texts,
      model: this.model,
      inputType: this.inputType,
    });

    const vectors: Array<number[] | undefined> = texts.map(() => undefined);
    for (const item of response.data ?? []) {
      if (item.embedding && item.index !== undefined) {
        vectors[item.index] = item.embedding;
      }
    }

    return vectors.map((vector, index) => {
      if (!vector) {
        throw new Error(`${this.model} returned no vector for input ${index}`);
      }
      return vector;
    });
  }
}
