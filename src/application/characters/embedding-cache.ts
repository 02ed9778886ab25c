import { AppError, ProviderError } from "../../domain/common/errors";
import { requireClient, type Backend } from "../../infrastructure/backend";
import { TtlCache, type Clock } from "../../infrastructure/cache/ttl-cache";
import type { EmbeddingsBackend } from "../../infrastructure/embeddings/types";

export type EmbeddingCacheOptions = {
  backend: Backend<EmbeddingsBackend>;
  ttlSeconds?: number;
  now?: Clock;
};

/**
 * Memoises text → vector for a short window so the same query or
 * description submitted twice costs one backend call.
 */
export class EmbeddingCache {
  private readonly backend: Backend<EmbeddingsBackend>;
  private readonly cache: TtlCache<string, number[]>;

  constructor(options: EmbeddingCacheOptions) {
    this.backend = options.backend;
    this.cache = new TtlCache({
      ttlMs: (options.ttlSeconds ?? 300) * 1000,
      now: options.now,
    });
  }

  /**
   * @throws BackendUnavailableError when no embedding client was constructed
   * @throws ProviderError when the backend call fails
   */
  async embed(text: string): Promise<number[]> {
    const client = requireClient(this.backend, "embedding");
    return this.cache.getOrCompute(text, async () => {
      let vectors: number[][];
      try {
        vectors = await client.embedDocuments([text]);
      } catch (error) {
        if (error instanceof AppError) throw error;
        throw new ProviderError({
          provider: client.model,
          retryable: false,
          message: `Embedding request failed: ${error instanceof Error ? error.message : String(error)}`,
          cause: error,
        });
      }
      const vector = vectors[0];
      if (!vector || vector.length === 0) {
        throw new ProviderError({
          provider: client.model,
          retryable: false,
          message: "Embedding backend returned no vector",
        });
      }
      return vector;
    });
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
