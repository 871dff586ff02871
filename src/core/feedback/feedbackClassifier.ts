import type { DurationDirection, FeedbackClassification, GroupingMode, RefinementIntent } from '../@types';
import { detectDeclaredMode, extractGroupSize } from '../shared/grouping-keywords';
import { collapseWhitespace, foldText, tokenize } from '../shared/text';

interface InstructionContext {
  rawText: string;
  targetMode?: GroupingMode;
  targetGroupSize?: number;
  durationDirection?: DurationDirection;
}

interface IntentRule {
  intent: RefinementIntent;
  /** Matched against lowercase text with accents removed. */
  patterns: readonly RegExp[];
  /** When set, one of these must also match (or a group size must be stated). */
  cues?: readonly RegExp[];
  instruction(context: InstructionContext): string;
}

const MODE_LABELS: Record<GroupingMode, string> = {
  individual: 'individual work',
  pair: 'work in pairs',
  group: 'work in groups',
};

/** Declaration order is the order intents are reported in. */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: 'clarification',
    patterns: [
      /\bno (?:lo |la )?entiendo\b/,
      /\bno (?:me )?queda claro\b/,
      /\bno (?:esta|es) claro\b/,
      /\bconfus[oa]\b/,
      /\bexplica(?:me|lo)?\b/,
      /\b(?:don'?t|do not) understand\b/,
      /\bunclear\b/,
      /\bconfus(?:ed|ing)\b/,
      /\bclarify\b/,
    ],
    instruction: () =>
      'Rewrite the parts the teacher found confusing in plainer, more concrete language without changing the structure.',
  },
  {
    intent: 'mechanics-explanation',
    patterns: [
      /\bcomo (?:se )?(?:juega|funciona|hace|desarrolla|organiza)\b/,
      /\bmecanica\b/,
      /\bdinamica\b/,
      /\bpaso a paso\b/,
      /\bhow (?:does it|do they|do we|to) (?:work|play|run)\b/,
      /\bmechanics?\b/,
      /\bstep by step\b/,
    ],
    instruction: () =>
      'Explain step by step how each phase runs: what learners do, in which order, and how turns pass between them.',
  },
  {
    intent: 'rule-definition',
    patterns: [/\breglas?\b/, /\bnormas?\b/, /\bque (?:se puede|esta permitido)\b/, /\brules?\b/, /\ballowed\b/],
    instruction: () =>
      'Add an explicit list of rules to each phase, stating what is allowed and how disagreements are settled.',
  },
  {
    intent: 'grouping-change',
    patterns: [
      /\bparejas?\b/,
      /\bgrupos?\b/,
      /\bequipos?\b/,
      /\bindividual(?:mente)?\b/,
      /\bagrupa(?:r|miento|ciones?)?\b/,
      /\bpairs?\b/,
      /\bgroups?\b/,
      /\bteams?\b/,
      /\bindividually\b/,
    ],
    cues: [
      /\bcambi(?:a|ar|alo|alos|emos)\b/,
      /\ben (?:lugar|vez) de\b/,
      /\bprefier[oe]\b/,
      /\bmejor (?:en|por|de|individual)/,
      /\bque (?:trabajen|lo hagan|vayan)\b/,
      /\b(?:hazlo|hacerlo|ponlos|ponerlos|organizalos|separalos|juntalos)\b/,
      /\bpas(?:a|ar) a\b/,
      /\b(?:re)?agrupa(?:r|los|las)?\b/,
      /\binstead\b/,
      /\bswitch(?:es)? to\b/,
      /\bchange\b/,
      /\brather\b/,
      /\b(?:make|put) (?:it|them)\b/,
      /\blet them work\b/,
    ],
    instruction: ({ targetMode, targetGroupSize }) => {
      if (!targetMode) {
        return 'Revisit how learners are grouped in each phase and state the grouping explicitly.';
      }

      const size = targetMode === 'group' && targetGroupSize ? ` of ${targetGroupSize}` : '';
      return `Switch every phase to ${MODE_LABELS[targetMode]}${size} and reassign each task to the new groups.`;
    },
  },
  {
    intent: 'materials-query',
    patterns: [
      /\bmateriales?\b/,
      /\brecursos?\b/,
      /\bque (?:necesito|necesitamos|necesitan|hace falta)\b/,
      /\bmaterials?\b/,
      /\bresources?\b/,
      /\bsupplies\b/,
    ],
    instruction: () => 'List the materials each phase needs, with quantities per group.',
  },
  {
    intent: 'duration-change',
    patterns: [
      /\bcuanto (?:dura|tiempo)\b/,
      /\bduracion\b/,
      /\bmas (?:cort[oa]|larg[oa]|tiempo)\b/,
      /\bmenos tiempo\b/,
      /\b(?:acortar|alargar|reducir|ampliar)\b/,
      /\bminutos?\b/,
      /\bsesion(?:es)?\b/,
      /\bhow long\b/,
      /\bduration\b/,
      /\b(?:shorter|longer)\b/,
      /\bminutes?\b/,
    ],
    instruction: ({ durationDirection }) => {
      if (durationDirection === 'shorter') {
        return 'Shorten the activity by about 15 minutes and update the time of each phase.';
      }

      if (durationDirection === 'longer') {
        return 'Extend the activity by about 15 minutes and update the time of each phase.';
      }

      return 'State the total duration and the time assigned to each phase explicitly.';
    },
  },
  {
    intent: 'other',
    patterns: [],
    instruction: ({ rawText }) => `Apply the teacher's feedback as written: "${rawText}".`,
  },
];

/** Explanation intents that make a generic "I don't understand" redundant. */
const SPECIFIC_EXPLANATION_INTENTS: ReadonlySet<RefinementIntent> = new Set<RefinementIntent>([
  'mechanics-explanation',
  'rule-definition',
  'materials-query',
]);

const SHORTER_PATTERN = /\b(?:mas cort[oa]|menos tiempo|acortar|reducir|shorter|less time)\b/;
const LONGER_PATTERN = /\b(?:mas larg[oa]|mas tiempo|alargar|ampliar|longer|more time)\b/;

const detectDurationDirection = (folded: string): DurationDirection | undefined => {
  const shorter = SHORTER_PATTERN.test(folded);
  const longer = LONGER_PATTERN.test(folded);

  if (shorter === longer) {
    return undefined;
  }

  return shorter ? 'shorter' : 'longer';
};

/** Rule-based and deterministic: the same text always yields the same classification. */
export class FeedbackClassifier {
  public constructor(private readonly rules: readonly IntentRule[] = INTENT_RULES) {}

  public classify(text: string): FeedbackClassification {
    const rawText = collapseWhitespace(text);
    const folded = foldText(rawText);

    const statedSize = extractGroupSize(folded);
    const matched = new Set<RefinementIntent>(
      this.rules
        .filter((rule) => rule.patterns.some((pattern) => pattern.test(folded)))
        .filter((rule) => !rule.cues || statedSize !== undefined || rule.cues.some((cue) => cue.test(folded)))
        .map((rule) => rule.intent),
    );

    if ([...matched].some((intent) => SPECIFIC_EXPLANATION_INTENTS.has(intent))) {
      matched.delete('clarification');
    }

    if (matched.size === 0) {
      matched.add('other');
    }

    const context: InstructionContext = { rawText };
    if (matched.has('grouping-change')) {
      context.targetMode = detectDeclaredMode(tokenize(rawText));
      context.targetGroupSize = statedSize;
      if (context.targetMode === undefined && context.targetGroupSize !== undefined) {
        context.targetMode = 'group';
      }
    }
    if (matched.has('duration-change')) {
      context.durationDirection = detectDurationDirection(folded);
    }

    const applicable = this.rules.filter((rule) => matched.has(rule.intent));

    return {
      intents: applicable.map((rule) => rule.intent),
      instructions: applicable.map((rule) => rule.instruction(context)),
      ...(context.targetMode !== undefined ? { targetMode: context.targetMode } : {}),
      ...(context.targetGroupSize !== undefined ? { targetGroupSize: context.targetGroupSize } : {}),
      ...(context.durationDirection !== undefined ? { durationDirection: context.durationDirection } : {}),
    };
  }
}
