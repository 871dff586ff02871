import { describe, expect, it, vi } from 'vitest';

import { EmbeddingCacheStore } from '../embeddings/embeddingCacheStore';
import { InMemoryCacheStorage } from '../embeddings/embeddingCacheStorage';
import type { EmbeddingProvider } from '../embeddings/embeddingProvider';
import { ActivityLibrary, type ActivityRecordInput } from '../library/activityLibrary';
import { AppError } from '../shared/errors/app-error';
import type { RetryPolicy } from '../shared/retry';
import { SimilaritySearchEngine, cosineSimilarity } from './similaritySearch';

const noRetry: RetryPolicy = { timeoutMs: 1_000, retries: 0, backoffMs: 0 };

const pizzeria: ActivityRecordInput = {
  id: 'pizzeria',
  title: 'Pizzería de fracciones',
  subjects: ['matematicas', 'fracciones'],
  description: 'Reparten pizzas de cartulina según los pedidos.',
  durationMinutes: 90,
  groupingMode: 'pair',
};

const mapas: ActivityRecordInput = {
  id: 'mapas',
  title: 'Mapas de comunidades',
  subjects: ['geografia', 'mapas'],
  description: 'Cada alumno dibuja el mapa de su comunidad.',
  durationMinutes: 60,
  groupingMode: 'individual',
};

/** Fixed vectors keyed on the normalized text the cache hands over. */
const scenarioProvider = (failOn?: string): EmbeddingProvider => ({
  model: 'scenario',
  dimensions: undefined,
  embed: (text) => {
    if (failOn && text.includes(failOn)) {
      return Promise.reject(new Error('provider down'));
    }
    if (text.includes('pizzer')) {
      return Promise.resolve([0.6, 0.8]);
    }
    if (text.includes('mapas de comunidades')) {
      return Promise.resolve([0.64, 0.768]);
    }
    return Promise.resolve([1, 0]);
  },
});

const createEngine = (records: ActivityRecordInput[], provider: EmbeddingProvider): SimilaritySearchEngine => {
  const cache = new EmbeddingCacheStore(provider, new InMemoryCacheStorage(), noRetry);
  return new SimilaritySearchEngine(ActivityLibrary.fromRecords(records), cache);
};

describe('cosineSimilarity', () => {
  it('returns 0 for mismatched or zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  it('is scale invariant', () => {
    expect(cosineSimilarity([2, 0], [0.6, 0.8])).toBeCloseTo(0.6, 10);
  });
});

describe('SimilaritySearchEngine.findTopK', () => {
  it('ranks the fractions activity first for a fractions-in-pairs request', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const engine = createEngine([pizzeria, mapas], scenarioProvider());

    const [first, second] = await engine.findTopK('fracciones en parejas', 2);

    expect(first?.activity.id).toBe('pizzeria');
    expect(first?.cosine).toBeCloseTo(0.6, 10);
    expect(first?.score).toBeCloseTo(0.85, 10);
    expect(first?.boosts).toEqual([
      { ruleId: 'subject_keyword', magnitude: 0.15, evidence: 'fracciones' },
      { ruleId: 'title_term', magnitude: 0.05, evidence: 'fracciones' },
      { ruleId: 'grouping_mode_match', magnitude: 0.05, evidence: 'pair' },
    ]);

    expect(second?.activity.id).toBe('mapas');
    expect(second?.cosine).toBeCloseTo(0.640184, 5);
    expect(second?.score).toBeCloseTo(0.540184, 5);
    expect(second?.boosts).toEqual([
      { ruleId: 'grouping_mode_mismatch', magnitude: -0.1, evidence: 'pair!=individual' },
    ]);
  });

  it('returns at most k results', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const engine = createEngine([pizzeria, mapas], scenarioProvider());

    const results = await engine.findTopK('fracciones en parejas', 1);

    expect(results.map((result) => result.activity.id)).toEqual(['pizzeria']);
  });

  it('ranks the same way whatever the library order when scores differ', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const celulas: ActivityRecordInput = {
      id: 'celulas',
      title: 'Células gigantes',
      subjects: ['ciencias'],
      description: 'Modelan una célula con plastilina.',
      durationMinutes: 50,
      groupingMode: 'individual',
    };
    const orders = [
      [pizzeria, mapas, celulas],
      [mapas, celulas, pizzeria],
      [celulas, pizzeria, mapas],
      [mapas, pizzeria, celulas],
    ];

    for (const order of orders) {
      const results = await createEngine(order, scenarioProvider()).findTopK('fracciones en parejas', 3);

      expect(results.map((result) => result.activity.id)).toEqual(['celulas', 'pizzeria', 'mapas']);
    }
  });

  it('breaks score ties by library order', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const flat: EmbeddingProvider = { model: 'flat', dimensions: undefined, embed: () => Promise.resolve([1, 0]) };
    const first = { ...pizzeria, id: 'first', title: 'Uno', subjects: [] };
    const second = { ...pizzeria, id: 'second', title: 'Dos', subjects: [] };

    const forward = await createEngine([first, second], flat).findTopK('colores', 2);
    const reversed = await createEngine([second, first], flat).findTopK('colores', 2);

    expect(forward.map((result) => result.activity.id)).toEqual(['first', 'second']);
    expect(reversed.map((result) => result.activity.id)).toEqual(['second', 'first']);
  });

  it('returns an empty list for an empty library', async () => {
    const engine = createEngine([], scenarioProvider());

    await expect(engine.findTopK('fracciones', 3)).resolves.toEqual([]);
  });

  it('returns an empty list when the request cannot be embedded', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const engine = createEngine([pizzeria, mapas], scenarioProvider('fracciones en parejas'));

    await expect(engine.findTopK('fracciones en parejas', 2)).resolves.toEqual([]);
  });

  it('skips records whose embedding fails', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const engine = createEngine([pizzeria, mapas], scenarioProvider('mapas de comunidades'));

    const results = await engine.findTopK('fracciones en parejas', 2);

    expect(results.map((result) => result.activity.id)).toEqual(['pizzeria']);
  });

  it('rejects a k below 1', async () => {
    const engine = createEngine([pizzeria], scenarioProvider());

    await expect(engine.findTopK('fracciones', 0)).rejects.toMatchObject({
      statusCode: 400,
      code: 'INVALID_TOP_K',
    });
    await expect(engine.findTopK('fracciones', 0)).rejects.toBeInstanceOf(AppError);
  });
});
