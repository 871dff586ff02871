import type { GroupingMode } from '../@types';
import { detectDeclaredMode, extractGroupSize } from '../shared/grouping-keywords';
import { foldText, tokenize } from '../shared/text';

export interface SynonymRule {
  triggers: readonly string[];
  expansion: readonly string[];
}

/** Triggers and expansions are folded tokens (lowercase, no accents). */
export const DEFAULT_SYNONYM_TABLE: readonly SynonymRule[] = [
  {
    triggers: ['fracciones', 'fraccion', 'matematicas', 'sumas', 'restas', 'multiplicaciones', 'divisiones'],
    expansion: ['competencias', 'matematicas', 'calculo', 'operaciones'],
  },
  {
    triggers: ['ciencias', 'celulas', 'celula', 'experimento', 'experimentos'],
    expansion: ['ciencias', 'naturales', 'investigacion', 'metodo', 'cientifico'],
  },
  {
    triggers: ['lengua', 'lectura', 'escritura', 'redaccion'],
    expansion: ['lengua', 'castellana', 'comunicacion', 'textual'],
  },
  {
    triggers: ['geografia', 'mapas', 'mapa'],
    expansion: ['geografia', 'territorio', 'localizacion'],
  },
  {
    triggers: ['colaborativo', 'grupos', 'equipos'],
    expansion: ['trabajo', 'colaborativo', 'cooperativo'],
  },
  {
    triggers: ['individual', 'autonomo'],
    expansion: ['trabajo', 'individual', 'autonomo'],
  },
  {
    triggers: ['creativo', 'mural', 'arte'],
    expansion: ['creatividad', 'artistica', 'diseno', 'visual'],
  },
  {
    triggers: ['supermercado', 'tienda', 'compras'],
    expansion: ['supermercado', 'comercio', 'dinero', 'transacciones'],
  },
];

/** Topic words that point at a roster competency key. */
const SUBJECT_ALIASES: Record<string, string> = {
  fracciones: 'matematicas',
  fraccion: 'matematicas',
  sumas: 'matematicas',
  restas: 'matematicas',
  dinero: 'matematicas',
  supermercado: 'matematicas',
  math: 'matematicas',
  celulas: 'ciencias',
  celula: 'ciencias',
  experimento: 'ciencias',
  science: 'ciencias',
  mapas: 'geografia',
  mapa: 'geografia',
  lectura: 'lengua',
  escritura: 'lengua',
  piratas: 'lengua',
};

export interface NormalizedRequest {
  original: string;
  /** Folded tokens of the request as written. */
  tokens: string[];
  /** `tokens` followed by synonym expansions not already present. */
  expandedTokens: string[];
  /** Text handed to the embedding cache. */
  text: string;
  declaredMode?: GroupingMode;
  requestedGroupSize?: number;
}

export const normalizeRequest = (
  requestText: string,
  synonyms: readonly SynonymRule[] = DEFAULT_SYNONYM_TABLE,
): NormalizedRequest => {
  const tokens = tokenize(requestText);
  const present = new Set(tokens);
  const expandedTokens = [...tokens];

  for (const rule of synonyms) {
    if (!rule.triggers.some((trigger) => present.has(trigger))) {
      continue;
    }

    for (const term of rule.expansion) {
      if (!present.has(term)) {
        present.add(term);
        expandedTokens.push(term);
      }
    }
  }

  return {
    original: requestText,
    tokens,
    expandedTokens,
    text: expandedTokens.join(' '),
    declaredMode: detectDeclaredMode(tokens),
    requestedGroupSize: extractGroupSize(foldText(requestText)),
  };
};

/**
 * Picks the roster subject the request is about: a token naming a known subject
 * directly wins over an alias; the first match in request order is used.
 */
export const detectFocusSubject = (
  tokens: readonly string[],
  knownSubjects: readonly string[],
): string | undefined => {
  const known = new Map(knownSubjects.map((subject) => [foldText(subject), subject]));

  for (const token of tokens) {
    const direct = known.get(token);
    if (direct) {
      return direct;
    }
  }

  for (const token of tokens) {
    const alias = SUBJECT_ALIASES[token];
    const subject = alias ? known.get(alias) : undefined;
    if (subject) {
      return subject;
    }
  }

  return undefined;
};
