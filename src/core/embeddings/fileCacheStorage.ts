import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { z } from 'zod';

import { logger } from '../shared/logger';
import type { EmbeddingCacheEntry, EmbeddingCacheStorage } from './embeddingCacheStorage';

const cacheFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(
    z.object({
      hash: z.string().regex(/^[0-9a-f]{64}$/),
      vector: z.array(z.number().finite()).min(1),
      sourceKey: z.string().optional(),
      model: z.string().min(1),
      createdAt: z.string(),
    }),
  ),
});

const isMissingFile = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
};

/**
 * JSON file storage. Every write rewrites the whole file through a temp file and
 * a rename, so readers never observe a half-written cache. Writes are serialized.
 */
export class FileCacheStorage implements EmbeddingCacheStorage {
  private readonly entries = new Map<string, EmbeddingCacheEntry>();
  private writeChain: Promise<void> = Promise.resolve();

  public constructor(private readonly filePath: string) {}

  public async load(): Promise<EmbeddingCacheEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error: unknown) {
      logger.warn('embedding_cache_file_corrupt', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    const parsed = cacheFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('embedding_cache_file_invalid', {
        path: this.filePath,
        issues: parsed.error.issues.length,
      });
      return [];
    }

    this.entries.clear();
    for (const entry of parsed.data.entries) {
      this.entries.set(entry.hash, entry);
    }

    return [...this.entries.values()];
  }

  public put(entry: EmbeddingCacheEntry): Promise<void> {
    return this.enqueue(() => {
      this.entries.set(entry.hash, entry);
    });
  }

  public remove(hash: string): Promise<void> {
    return this.enqueue(() => {
      this.entries.delete(hash);
    });
  }

  private enqueue(mutate: () => void): Promise<void> {
    const next = this.writeChain.then(async () => {
      mutate();
      await this.flush();
    });
    // A failed write must not block the ones queued after it.
    this.writeChain = next.catch((error: unknown) => {
      logger.warn('embedding_cache_write_failed', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return next;
  }

  private async flush(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    const payload = {
      version: 1,
      entries: [...this.entries.values()],
    };

    await writeFile(tempPath, JSON.stringify(payload), 'utf8');
    await rename(tempPath, this.filePath);
  }
}
