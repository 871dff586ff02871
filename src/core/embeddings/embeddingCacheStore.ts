import { createHash } from 'node:crypto';

import { EmbeddingUnavailableError } from '../shared/errors/planner-errors';
import { describeError, logger } from '../shared/logger';
import { callWithRetry, type RetryPolicy } from '../shared/retry';
import { normalizeForHash } from '../shared/text';
import type { EmbeddingProvider } from './embeddingProvider';
import type { EmbeddingCacheEntry, EmbeddingCacheStorage } from './embeddingCacheStorage';

export interface GetOrComputeOptions {
  /**
   * Stable identity of the text's origin (e.g. `activity:<id>`). When the same
   * source produces a new hash, the previous entry for that source is retired.
   */
  sourceKey?: string;
}

export const hashContent = (normalizedText: string): string => {
  return createHash('sha256').update(normalizedText, 'utf8').digest('hex');
};

const isUsableVector = (vector: readonly unknown[], expectedDimensions: number | undefined): boolean => {
  if (vector.length === 0) {
    return false;
  }

  if (expectedDimensions !== undefined && vector.length !== expectedDimensions) {
    return false;
  }

  return vector.every((value) => typeof value === 'number' && Number.isFinite(value));
};

/**
 * Content-addressed arena of immutable embedding entries. Lookups hash the
 * normalized text, so a returned vector always belongs to the text as it is now.
 */
export class EmbeddingCacheStore {
  private readonly entries = new Map<string, EmbeddingCacheEntry>();
  private readonly sourceIndex = new Map<string, string>();
  private readonly inFlight = new Map<string, Promise<readonly number[]>>();
  private loading: Promise<void> | undefined;

  public constructor(
    private readonly provider: EmbeddingProvider,
    private readonly storage: EmbeddingCacheStorage,
    private readonly retryPolicy: RetryPolicy,
  ) {}

  public get size(): number {
    return this.entries.size;
  }

  public init(): Promise<void> {
    this.loading ??= this.loadEntries();
    return this.loading;
  }

  public async getOrCompute(text: string, options: GetOrComputeOptions = {}): Promise<readonly number[]> {
    await this.init();

    const normalized = normalizeForHash(text);
    const hash = hashContent(normalized);
    const cached = this.entries.get(hash);

    if (cached) {
      if (options.sourceKey) {
        await this.bindSource(options.sourceKey, hash);
      }
      return cached.vector;
    }

    const pending = this.inFlight.get(hash);
    if (pending) {
      return pending;
    }

    const computation = this.compute(normalized, hash, options.sourceKey).finally(() => {
      this.inFlight.delete(hash);
    });
    this.inFlight.set(hash, computation);
    return computation;
  }

  private async loadEntries(): Promise<void> {
    const stored = await this.storage.load();
    let skipped = 0;

    for (const entry of stored) {
      if (entry.model !== this.provider.model || !isUsableVector(entry.vector, this.provider.dimensions)) {
        skipped += 1;
        continue;
      }

      this.entries.set(entry.hash, Object.freeze({ ...entry, vector: Object.freeze([...entry.vector]) }));
      if (entry.sourceKey) {
        this.sourceIndex.set(entry.sourceKey, entry.hash);
      }
    }

    logger.info('embedding_cache_loaded', {
      entries: this.entries.size,
      skipped,
      model: this.provider.model,
    });
  }

  private async compute(
    normalized: string,
    hash: string,
    sourceKey: string | undefined,
  ): Promise<readonly number[]> {
    let vector: number[];

    try {
      vector = await callWithRetry(
        'embedding',
        (signal) => this.provider.embed(normalized, signal),
        this.retryPolicy,
      );
    } catch (error: unknown) {
      logger.warn('embedding_unavailable', {
        hash,
        sourceKey,
        error: describeError(error),
      });
      throw new EmbeddingUnavailableError('The embedding provider could not produce a vector.', {
        cause: describeError(error),
      });
    }

    if (!isUsableVector(vector, this.provider.dimensions)) {
      logger.warn('embedding_vector_rejected', { hash, sourceKey, length: vector.length });
      throw new EmbeddingUnavailableError('The embedding provider returned an unusable vector.', {
        length: vector.length,
      });
    }

    const entry: EmbeddingCacheEntry = Object.freeze({
      hash,
      vector: Object.freeze([...vector]),
      sourceKey,
      model: this.provider.model,
      createdAt: new Date().toISOString(),
    });

    this.entries.set(hash, entry);
    await this.persist(() => this.storage.put(entry), hash);

    if (sourceKey) {
      await this.bindSource(sourceKey, hash);
    }

    return entry.vector;
  }

  private async bindSource(sourceKey: string, hash: string): Promise<void> {
    const previous = this.sourceIndex.get(sourceKey);
    this.sourceIndex.set(sourceKey, hash);

    if (previous === undefined || previous === hash) {
      return;
    }

    const stillReferenced = [...this.sourceIndex.values()].includes(previous);
    if (stillReferenced) {
      return;
    }

    this.entries.delete(previous);
    logger.info('embedding_cache_entry_replaced', { sourceKey, previousHash: previous, hash });
    await this.persist(() => this.storage.remove(previous), previous);
  }

  private async persist(write: () => Promise<void>, hash: string): Promise<void> {
    try {
      await write();
    } catch (error: unknown) {
      // The in-memory entry stays valid; the next run recomputes it.
      logger.warn('embedding_cache_persist_failed', { hash, error: describeError(error) });
    }
  }
}
