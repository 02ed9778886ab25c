export type Clock = () => number;

type Entry<V> = { value: V; expiresAtMs: number };

/**
 * In-memory map whose entries expire `ttlMs` after they were written.
 * Expired entries are dropped lazily on read.
 */
export class TtlCache<K, V> {
  private readonly ttlMs: number;
  private readonly now: Clock;
  private readonly entries = new Map<K, Entry<V>>();

  constructor(options: { ttlMs: number; now?: Clock }) {
    if (options.ttlMs <= 0) throw new Error("TtlCache ttlMs must be positive");
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAtMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: K, value: V): void {
    this.entries.set(key, { value, expiresAtMs: this.now() + this.ttlMs });
  }

  async getOrCompute(key: K, compute: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;
    const value = await compute();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }
}
