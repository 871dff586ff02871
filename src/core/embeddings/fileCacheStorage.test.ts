import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { hashContent } from './embeddingCacheStore';
import type { EmbeddingCacheEntry } from './embeddingCacheStorage';
import { FileCacheStorage } from './fileCacheStorage';

const entry = (text: string, vector: number[]): EmbeddingCacheEntry => ({
  hash: hashContent(text),
  vector,
  sourceKey: `activity:${text}`,
  model: 'test-model',
  createdAt: '2026-01-01T00:00:00.000Z',
});

describe('FileCacheStorage', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'embedding-cache-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('treats a missing file as an empty cache', async () => {
    const storage = new FileCacheStorage(join(directory, 'missing.json'));

    await expect(storage.load()).resolves.toEqual([]);
  });

  it('persists entries that a fresh instance can load', async () => {
    const filePath = join(directory, 'nested', 'cache.json');
    const writer = new FileCacheStorage(filePath);

    await Promise.all([writer.put(entry('mapas', [1, 0])), writer.put(entry('pizza', [0, 1]))]);

    const reloaded = await new FileCacheStorage(filePath).load();
    expect(reloaded.map((stored) => stored.hash)).toEqual([hashContent('mapas'), hashContent('pizza')]);
    expect(reloaded[1]?.vector).toEqual([0, 1]);
  });

  it('rewrites the file without removed entries', async () => {
    const filePath = join(directory, 'cache.json');
    const storage = new FileCacheStorage(filePath);

    await storage.put(entry('mapas', [1, 0]));
    await storage.put(entry('pizza', [0, 1]));
    await storage.remove(hashContent('mapas'));

    const written: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    expect(written).toEqual({ version: 1, entries: [entry('pizza', [0, 1])] });
  });

  it('starts empty when the file is corrupt', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const filePath = join(directory, 'cache.json');
    await writeFile(filePath, '{"version": 1, "entries": [', 'utf8');

    await expect(new FileCacheStorage(filePath).load()).resolves.toEqual([]);
    expect(String(log.mock.calls[0]?.[0])).toContain('"message":"embedding_cache_file_corrupt"');
  });

  it('starts empty when the file has an unknown layout', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const filePath = join(directory, 'cache.json');
    await writeFile(filePath, JSON.stringify({ version: 2, entries: [] }), 'utf8');

    await expect(new FileCacheStorage(filePath).load()).resolves.toEqual([]);
  });
});
