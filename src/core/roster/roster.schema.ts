import { z } from 'zod';

import { foldText } from '../shared/text';
import { BEHAVIOR_LEVELS, DIAGNOSTIC_CATEGORIES, LEARNING_CHANNELS } from './categories';

export const competencyLevelSchema = z.coerce.number().int().min(1).max(5);

/** Subject keys are matched folded, so "Matemáticas" and "matematicas" are one subject. */
export const foldCompetencyKeys = (competencies: Record<string, number>): Record<string, number> => {
  return Object.fromEntries(Object.entries(competencies).map(([subject, level]) => [foldText(subject), level]));
};

export const learnerProfileSchema = z.object({
  id: z.string().trim().min(1).max(64),
  name: z.string().trim().min(1).max(120),
  diagnosticCategory: z.enum(DIAGNOSTIC_CATEGORIES),
  competencies: z.record(z.string().trim().min(1), competencyLevelSchema).default({}).transform(foldCompetencyKeys),
  preferredChannel: z.enum(LEARNING_CHANNELS).default('multisensory'),
  activityLevel: z.enum(BEHAVIOR_LEVELS).default('medium'),
  frustrationTolerance: z.enum(BEHAVIOR_LEVELS).default('medium'),
});

export const rosterFileSchema = z
  .object({
    classroomId: z.string().trim().min(1).default('default'),
    name: z.string().trim().min(1).default('Default classroom'),
    learners: z.array(learnerProfileSchema).min(1),
  })
  .refine((roster) => new Set(roster.learners.map((learner) => learner.id)).size === roster.learners.length, {
    message: 'Learner ids must be unique.',
    path: ['learners'],
  });

export type RosterFile = z.infer<typeof rosterFileSchema>;
