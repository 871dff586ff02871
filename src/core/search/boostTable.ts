import type { ActivityRecord, AppliedBoost, BoostRuleId } from '../@types';
import { foldText, tokenize } from '../shared/text';
import type { NormalizedRequest } from './requestNormalizer';

export interface BoostMagnitudes {
  subjectKeyword: number;
  titleTerm: number;
  groupingModeMatch: number;
  groupingModeMismatch: number;
}

export const DEFAULT_BOOST_MAGNITUDES: BoostMagnitudes = {
  subjectKeyword: 0.15,
  titleTerm: 0.05,
  groupingModeMatch: 0.05,
  groupingModeMismatch: -0.1,
};

const TITLE_STOP_WORDS: ReadonlySet<string> = new Set([
  'para',
  'sobre',
  'entre',
  'desde',
  'hasta',
  'como',
  'actividad',
  'actividades',
  'quiero',
  'clase',
  'alumnos',
  'alumnado',
  'with',
  'from',
  'about',
  'activity',
  'students',
  'class',
  'want',
]);

export interface BoostRule {
  id: BoostRuleId;
  /** Human-readable trigger condition, surfaced in docs and API responses. */
  trigger: string;
  magnitude(magnitudes: BoostMagnitudes): number;
  /** Returns the evidence that fired the rule, or undefined when it does not apply. */
  evaluate(request: NormalizedRequest, activity: ActivityRecord): string | undefined;
}

export const BOOST_RULES: readonly BoostRule[] = [
  {
    id: 'subject_keyword',
    trigger: 'A subject tag of the record appears as a token of the request.',
    magnitude: (magnitudes) => magnitudes.subjectKeyword,
    evaluate: (request, activity) => {
      const tokens = new Set(request.tokens);
      return activity.subjects.map(foldText).find((subject) => tokens.has(subject));
    },
  },
  {
    id: 'title_term',
    trigger: 'A request content word (4+ letters, not a stop word) appears in the record title.',
    magnitude: (magnitudes) => magnitudes.titleTerm,
    evaluate: (request, activity) => {
      const titleTokens = new Set(tokenize(activity.title));
      return request.tokens.find(
        (token) => token.length >= 4 && !TITLE_STOP_WORDS.has(token) && titleTokens.has(token),
      );
    },
  },
  {
    id: 'grouping_mode_match',
    trigger: 'The request declares the same grouping mode the record uses.',
    magnitude: (magnitudes) => magnitudes.groupingModeMatch,
    evaluate: (request, activity) =>
      request.declaredMode !== undefined && request.declaredMode === activity.groupingMode
        ? request.declaredMode
        : undefined,
  },
  {
    id: 'grouping_mode_mismatch',
    trigger: 'The request declares a grouping mode different from the record one.',
    magnitude: (magnitudes) => magnitudes.groupingModeMismatch,
    evaluate: (request, activity) =>
      request.declaredMode !== undefined && request.declaredMode !== activity.groupingMode
        ? `${request.declaredMode}!=${activity.groupingMode}`
        : undefined,
  },
];

/** Each rule fires at most once per record; the adjustments add to the raw cosine. */
export const evaluateBoosts = (
  request: NormalizedRequest,
  activity: ActivityRecord,
  magnitudes: BoostMagnitudes,
  rules: readonly BoostRule[] = BOOST_RULES,
): AppliedBoost[] => {
  const applied: AppliedBoost[] = [];

  for (const rule of rules) {
    const evidence = rule.evaluate(request, activity);
    if (evidence === undefined) {
      continue;
    }

    applied.push({ ruleId: rule.id, magnitude: rule.magnitude(magnitudes), evidence });
  }

  return applied;
};
