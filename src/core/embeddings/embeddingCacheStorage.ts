export interface EmbeddingCacheEntry {
  readonly hash: string;
  readonly vector: readonly number[];
  readonly sourceKey?: string;
  readonly model: string;
  readonly createdAt: string;
}

/**
 * Durable side of the cache. Writes are idempotent per hash; `remove` is only
 * used when a source's text changed and its old entry was replaced.
 */
export interface EmbeddingCacheStorage {
  load(): Promise<EmbeddingCacheEntry[]>;
  put(entry: EmbeddingCacheEntry): Promise<void>;
  remove(hash: string): Promise<void>;
}

export class InMemoryCacheStorage implements EmbeddingCacheStorage {
  private readonly entries = new Map<string, EmbeddingCacheEntry>();

  public load(): Promise<EmbeddingCacheEntry[]> {
    return Promise.resolve([...this.entries.values()]);
  }

  public put(entry: EmbeddingCacheEntry): Promise<void> {
    this.entries.set(entry.hash, entry);
    return Promise.resolve();
  }

  public remove(hash: string): Promise<void> {
    this.entries.delete(hash);
    return Promise.resolve();
  }
}
