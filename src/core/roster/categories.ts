import type {
  AdaptationMap,
  BehaviorLevel,
  DiagnosticCategory,
  LearnerProfile,
  LearningChannel,
} from '../@types';

export const DIAGNOSTIC_CATEGORIES = [
  'typical',
  'support_need_a',
  'support_need_b',
  'high_capability',
  'dual_exceptionality',
] as const satisfies readonly DiagnosticCategory[];

export const LEARNING_CHANNELS = [
  'visual',
  'auditory',
  'kinesthetic',
  'reading_writing',
  'multisensory',
] as const satisfies readonly LearningChannel[];

export const BEHAVIOR_LEVELS = ['low', 'medium', 'high'] as const satisfies readonly BehaviorLevel[];

const NEEDS_SUPPORT: ReadonlySet<DiagnosticCategory> = new Set<DiagnosticCategory>([
  'support_need_a',
  'support_need_b',
  'dual_exceptionality',
]);

export const isNeedsSupport = (learner: Pick<LearnerProfile, 'diagnosticCategory'>): boolean => {
  return NEEDS_SUPPORT.has(learner.diagnosticCategory);
};

/** Adaptations inserted when a draft leaves out a category present in the roster. */
export const DEFAULT_ADAPTATIONS: Readonly<Record<Exclude<DiagnosticCategory, 'typical'>, readonly string[]>> = {
  support_need_a: [
    'Bloques de trabajo cortos con pausas activas de movimiento.',
    'Lista de pasos para ir marcando lo completado.',
  ],
  support_need_b: [
    'Agenda visual de las fases con tiempos anunciados.',
    'Roles fijos comunicados antes de empezar.',
  ],
  high_capability: ['Reto de ampliación con preguntas abiertas y mayor autonomía.'],
  dual_exceptionality: [
    'Reto de ampliación acompañado de una guía visual paso a paso.',
  ],
};

const ADAPTATION_KEY_ALIASES: Record<string, DiagnosticCategory> = {
  typical: 'typical',
  tipico: 'typical',
  general: 'typical',
  support_need_a: 'support_need_a',
  tdah: 'support_need_a',
  adhd: 'support_need_a',
  atencion: 'support_need_a',
  attention: 'support_need_a',
  support_need_b: 'support_need_b',
  tea: 'support_need_b',
  autismo: 'support_need_b',
  autism: 'support_need_b',
  asd: 'support_need_b',
  high_capability: 'high_capability',
  altas_capacidades: 'high_capability',
  high_capabilities: 'high_capability',
  gifted: 'high_capability',
  dual_exceptionality: 'dual_exceptionality',
  doble_excepcionalidad: 'dual_exceptionality',
  twice_exceptional: 'dual_exceptionality',
  '2e': 'dual_exceptionality',
};

/** Maps a key such as "TEA", "altas capacidades" or "support_need_a" onto a category. */
export const resolveCategoryKey = (foldedKey: string): DiagnosticCategory | undefined => {
  return ADAPTATION_KEY_ALIASES[foldedKey.trim().replace(/[\s-]+/g, '_')];
};

export const categoriesNeedingAdaptations = (
  learners: readonly LearnerProfile[],
): Exclude<DiagnosticCategory, 'typical'>[] => {
  const present = new Set(learners.map((learner) => learner.diagnosticCategory));
  return DIAGNOSTIC_CATEGORIES.filter(
    (category): category is Exclude<DiagnosticCategory, 'typical'> =>
      category !== 'typical' && present.has(category),
  );
};

export const defaultAdaptationsFor = (learners: readonly LearnerProfile[]): AdaptationMap => {
  const adaptations: AdaptationMap = {};
  for (const category of categoriesNeedingAdaptations(learners)) {
    adaptations[category] = [...DEFAULT_ADAPTATIONS[category]];
  }
  return adaptations;
};
