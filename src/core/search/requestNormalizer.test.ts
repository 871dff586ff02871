import { describe, expect, it } from 'vitest';

import { detectFocusSubject, normalizeRequest } from './requestNormalizer';

describe('normalizeRequest', () => {
  it('folds the request and appends synonym expansions', () => {
    const normalized = normalizeRequest('Quiero una actividad de fracciones en parejas');

    expect(normalized.tokens).toEqual(['quiero', 'una', 'actividad', 'de', 'fracciones', 'en', 'parejas']);
    expect(normalized.expandedTokens.slice(7)).toEqual(['competencias', 'matematicas', 'calculo', 'operaciones']);
    expect(normalized.text).toBe(
      'quiero una actividad de fracciones en parejas competencias matematicas calculo operaciones',
    );
    expect(normalized.declaredMode).toBe('pair');
    expect(normalized.requestedGroupSize).toBeUndefined();
  });

  it('expands each term once and reads the requested group size', () => {
    const normalized = normalizeRequest('Trabajo en grupos de cuatro sobre células');

    expect(normalized.expandedTokens).toEqual([
      'trabajo',
      'en',
      'grupos',
      'de',
      'cuatro',
      'sobre',
      'celulas',
      'ciencias',
      'naturales',
      'investigacion',
      'metodo',
      'cientifico',
      'colaborativo',
      'cooperativo',
    ]);
    expect(normalized.declaredMode).toBe('group');
    expect(normalized.requestedGroupSize).toBe(4);
  });

  it('declares no mode when the request mentions several', () => {
    expect(normalizeRequest('Primero individual y luego en parejas').declaredMode).toBeUndefined();
  });

  it('uses a custom synonym table', () => {
    const normalized = normalizeRequest('Robots', [{ triggers: ['robots'], expansion: ['tecnologia'] }]);

    expect(normalized.text).toBe('robots tecnologia');
  });
});

describe('detectFocusSubject', () => {
  it('prefers a subject named directly', () => {
    expect(detectFocusSubject(['fracciones', 'lengua'], ['lengua', 'matematicas'])).toBe('lengua');
  });

  it('falls back to topic aliases', () => {
    expect(detectFocusSubject(['pizzas', 'fracciones'], ['lengua', 'matematicas'])).toBe('matematicas');
  });

  it('returns undefined when the roster has no matching subject', () => {
    expect(detectFocusSubject(['mapas'], ['lengua'])).toBeUndefined();
  });
});
