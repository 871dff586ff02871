import type { DataSource } from 'typeorm';

import { EmbeddingCacheRecord } from '../../database/entities/EmbeddingCacheRecord';
import type { EmbeddingCacheEntry, EmbeddingCacheStorage } from './embeddingCacheStorage';

/** Postgres storage: one row per hash, written with an upsert so duplicate writes are no-ops. */
export class DatabaseCacheStorage implements EmbeddingCacheStorage {
  public constructor(private readonly dataSource: DataSource) {}

  public async load(): Promise<EmbeddingCacheEntry[]> {
    const rows = await this.dataSource.getRepository(EmbeddingCacheRecord).find({
      order: { createdAt: 'ASC' },
    });

    return rows.map((row) => ({
      hash: row.contentHash,
      vector: row.vector,
      sourceKey: row.sourceKey ?? undefined,
      model: row.model,
      createdAt: row.createdAt.toISOString(),
    }));
  }

  public async put(entry: EmbeddingCacheEntry): Promise<void> {
    await this.dataSource.getRepository(EmbeddingCacheRecord).upsert(
      {
        contentHash: entry.hash,
        vector: [...entry.vector],
        sourceKey: entry.sourceKey ?? null,
        model: entry.model,
        createdAt: new Date(entry.createdAt),
      },
      { conflictPaths: ['contentHash'], skipUpdateIfNoValuesChanged: true },
    );
  }

  public async remove(hash: string): Promise<void> {
    await this.dataSource.getRepository(EmbeddingCacheRecord).delete({ contentHash: hash });
  }
}
