import { z } from 'zod';

import { BEHAVIOR_LEVELS, DIAGNOSTIC_CATEGORIES, LEARNING_CHANNELS } from '../../core/roster/categories';
import { competencyLevelSchema } from '../../core/roster/roster.schema';

export const learnerIdParamSchema = z.object({
  id: z.string().trim().uuid(),
});

export const getLearnersQuerySchema = z.object({
  classroomId: z.coerce.number().int().positive().optional(),
});

const learnerFields = {
  name: z.string().trim().min(1).max(120),
  diagnosticCategory: z.enum(DIAGNOSTIC_CATEGORIES),
  competencies: z.record(z.string().trim().min(1).max(80), competencyLevelSchema),
  preferredChannel: z.enum(LEARNING_CHANNELS),
  activityLevel: z.enum(BEHAVIOR_LEVELS),
  frustrationTolerance: z.enum(BEHAVIOR_LEVELS),
  classroomId: z.coerce.number().int().positive().nullable(),
};

export const createLearnerSchema = z.object({
  name: learnerFields.name,
  diagnosticCategory: learnerFields.diagnosticCategory.optional(),
  competencies: learnerFields.competencies.optional(),
  preferredChannel: learnerFields.preferredChannel.optional(),
  activityLevel: learnerFields.activityLevel.optional(),
  frustrationTolerance: learnerFields.frustrationTolerance.optional(),
  classroomId: learnerFields.classroomId.optional(),
});

export const updateLearnerSchema = z
  .object(learnerFields)
  .partial()
  .refine((value) => Object.values(value).some((field) => field !== undefined), {
    message: 'At least one field is required.',
  });

export type CreateLearnerBody = z.infer<typeof createLearnerSchema>;
export type UpdateLearnerBody = z.infer<typeof updateLearnerSchema>;
