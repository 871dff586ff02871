import { describe, expect, it } from 'vitest';

import { HashingEmbeddingProvider } from './embeddingProvider';

const norm = (vector: readonly number[]): number => Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));

describe('HashingEmbeddingProvider', () => {
  it('names its vector space after the dimensionality', () => {
    expect(new HashingEmbeddingProvider(64).model).toBe('local-hashing-64');
  });

  it('produces deterministic unit vectors', async () => {
    const provider = new HashingEmbeddingProvider(64);

    const first = await provider.embed('Fracciones en parejas');
    const second = await provider.embed('Fracciones en parejas');

    expect(first).toHaveLength(64);
    expect(second).toEqual(first);
    expect(norm(first)).toBeCloseTo(1, 10);
  });

  it('ignores case and accents', async () => {
    const provider = new HashingEmbeddingProvider(64);

    expect(await provider.embed('Geografía')).toEqual(await provider.embed('geografia'));
  });

  it('returns a zero vector for text without tokens', async () => {
    const provider = new HashingEmbeddingProvider(8);

    expect(await provider.embed('¿¡ !?')).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });
});
