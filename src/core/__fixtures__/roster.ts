import type { LearnerProfile, Roster } from '../@types';

export const buildLearner = (overrides: Partial<LearnerProfile> & Pick<LearnerProfile, 'id'>): LearnerProfile => ({
  name: `Learner ${overrides.id}`,
  diagnosticCategory: 'typical',
  competencies: {},
  preferredChannel: 'multisensory',
  activityLevel: 'medium',
  frustrationTolerance: 'medium',
  ...overrides,
});

/** Mirrors data/roster.json: two needs-support learners, one high-capability learner. */
export const classroomLearners: LearnerProfile[] = [
  buildLearner({ id: '001', name: 'Alex M.', competencies: { matematicas: 3, lengua: 4 } }),
  buildLearner({ id: '002', name: 'María L.', competencies: { matematicas: 4, lengua: 3 } }),
  buildLearner({
    id: '003',
    name: 'Elena R.',
    diagnosticCategory: 'support_need_b',
    competencies: { matematicas: 4, lengua: 2 },
  }),
  buildLearner({
    id: '004',
    name: 'Luis T.',
    diagnosticCategory: 'support_need_a',
    competencies: { matematicas: 2, lengua: 3 },
  }),
  buildLearner({
    id: '005',
    name: 'Ana V.',
    diagnosticCategory: 'high_capability',
    competencies: { matematicas: 5, lengua: 5 },
  }),
  buildLearner({ id: '006', name: 'Sara M.', competencies: { matematicas: 3, lengua: 3 } }),
  buildLearner({ id: '007', name: 'Emma K.', competencies: { matematicas: 2, lengua: 4 } }),
  buildLearner({ id: '008', name: 'Hugo P.', competencies: { matematicas: 4, lengua: 2 } }),
];

export const classroomRoster: Roster = {
  classroomId: '4A',
  name: '4º A',
  learners: classroomLearners,
};
