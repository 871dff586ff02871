import type { DiagnosticCategory, GroupingMode, Roster } from '../@types';
import { isNeedsSupport } from '../roster/categories';
import {
  DEFAULT_SYNONYM_TABLE,
  detectFocusSubject,
  normalizeRequest,
  type NormalizedRequest,
  type SynonymRule,
} from '../search/requestNormalizer';

export interface RosterSummary {
  total: number;
  needsSupport: number;
  byCategory: Record<DiagnosticCategory, number>;
  subjects: string[];
}

export interface RequestAnalysis {
  requestText: string;
  normalized: NormalizedRequest;
  declaredMode?: GroupingMode;
  requestedGroupSize?: number;
  focusSubject?: string;
  roster: RosterSummary;
}

export const summarizeRoster = (roster: Roster): RosterSummary => {
  const byCategory: Record<DiagnosticCategory, number> = {
    typical: 0,
    support_need_a: 0,
    support_need_b: 0,
    high_capability: 0,
    dual_exceptionality: 0,
  };
  const subjects = new Set<string>();

  for (const learner of roster.learners) {
    byCategory[learner.diagnosticCategory] += 1;
    for (const subject of Object.keys(learner.competencies)) {
      subjects.add(subject);
    }
  }

  return {
    total: roster.learners.length,
    needsSupport: roster.learners.filter(isNeedsSupport).length,
    byCategory,
    subjects: [...subjects].sort(),
  };
};

/** First stage: reads the request and the roster, producing the facts later stages key on. */
export const runAnalystStage = (
  requestText: string,
  roster: Roster,
  synonyms: readonly SynonymRule[] = DEFAULT_SYNONYM_TABLE,
): RequestAnalysis => {
  const normalized = normalizeRequest(requestText, synonyms);
  const summary = summarizeRoster(roster);

  return {
    requestText,
    normalized,
    declaredMode: normalized.declaredMode,
    requestedGroupSize: normalized.requestedGroupSize,
    focusSubject: detectFocusSubject(normalized.tokens, summary.subjects),
    roster: summary,
  };
};
