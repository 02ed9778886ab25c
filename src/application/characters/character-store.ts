import {
  BackendUnavailableError,
  ProviderError,
  StoreUnavailableError,
  ValidationError,
} from "../../domain/common/errors";
import {
  CharacterSchema,
  type Character,
  type CharacterMatch,
  type CharacterVectorStore,
} from "../../domain/characters/character";
import { TtlCache, type Clock } from "../../infrastructure/cache/ttl-cache";
import { silentLogger, type Logger } from "../../infrastructure/logging/logger";
import type { EmbeddingCache } from "./embedding-cache";

export const DEFAULT_SEARCH_K = 3;

export type CharacterStoreOptions = {
  store: CharacterVectorStore;
  embeddings: EmbeddingCache;
  logger?: Logger;
  cacheTtlSeconds?: number;
  now?: Clock;
};

/** Failures a read may absorb; anything else is a defect and propagates. */
function isDegradable(error: unknown): boolean {
  return (
    error instanceof StoreUnavailableError ||
    error instanceof BackendUnavailableError ||
    error instanceof ProviderError
  );
}

/**
 * Keyed roster of characters backed by a vector store. Writes replace the
 * whole record (description and embedding together) and invalidate every
 * cached read, including memoised embeddings.
 */
export class CharacterStore {
  private readonly store: CharacterVectorStore;
  private readonly embeddings: EmbeddingCache;
  private readonly logger: Logger;
  private readonly names: TtlCache<"all", string[]>;
  private readonly descriptions: TtlCache<string, string>;

  constructor(options: CharacterStoreOptions) {
    this.store = options.store;
    this.embeddings = options.embeddings;
    this.logger = options.logger ?? silentLogger;
    const ttlMs = (options.cacheTtlSeconds ?? 60) * 1000;
    this.names = new TtlCache({ ttlMs, now: options.now });
    this.descriptions = new TtlCache({ ttlMs, now: options.now });
  }

  async upsert(name: string, description: string): Promise<void> {
    const parsed = CharacterSchema.safeParse({ name, description });
    if (!parsed.success) {
      throw new ValidationError("Both name and description required.", parsed.error);
    }

    const vector = await this.embeddings.embed(description);
    try {
      await this.store.upsert({
        id: name,
        document: description,
        vector,
        metadata: { name, updatedAtMs: Date.now() },
      });
    } finally {
      this.invalidate();
    }
    this.logger.debug(`Saved character "${name}" (${vector.length} dims)`);
  }

  async delete(name: string): Promise<void> {
    try {
      await this.store.delete(name);
    } finally {
      this.invalidate();
    }
    this.logger.debug(`Deleted character "${name}"`);
  }

  async listNames(): Promise<string[]> {
    const cached = this.names.get("all");
    if (cached) return [...cached];
    try {
      const { ids } = await this.store.get();
      this.names.set("all", ids);
      return [...ids];
    } catch (error) {
      return this.degrade(error, "list characters", []);
    }
  }

  /** Stored description, or "" when no character has that name. */
  async getDescription(name: string): Promise<string> {
    const cached = this.descriptions.get(name);
    if (cached !== undefined) return cached;
    try {
      const { documents } = await this.store.get([name]);
      const description = documents[0] ?? "";
      this.descriptions.set(name, description);
      return description;
    } catch (error) {
      return this.degrade(error, `look up "${name}"`, "");
    }
  }

  async list(): Promise<Character[]> {
    try {
      const { ids, documents } = await this.store.get();
      return ids.map((name, i) => ({ name, description: documents[i] ?? "" }));
    } catch (error) {
      return this.degrade(error, "list characters", []);
    }
  }

  /** Closest characters to `query`, best first. Best-effort: failures yield []. */
  async search(query: string, k: number = DEFAULT_SEARCH_K): Promise<CharacterMatch[]> {
    if (k <= 0 || query.trim() === "") return [];
    try {
      const vector = await this.embeddings.embed(query);
      const res = await this.store.query(vector, k);
      return res.ids.slice(0, k).map((id, i) => ({
        name: res.metadatas[i]?.name ?? id,
        description: res.documents[i] ?? "",
        distance: res.distances[i] ?? Number.POSITIVE_INFINITY,
      }));
    } catch (error) {
      return this.degrade(error, "search characters", []);
    }
  }

  private invalidate(): void {
    this.names.clear();
    this.descriptions.clear();
    this.embeddings.clear();
  }

  private degrade<T>(error: unknown, action: string, fallback: T): T {
    if (!isDegradable(error)) throw error;
    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn(`Could not ${action}: ${message}`);
    return fallback;
  }
}
