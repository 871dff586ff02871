import { z } from 'zod';

export const planningSessionIdParamSchema = z.object({
  id: z.string().trim().uuid(),
});

export const createPlanningSessionSchema = z.object({
  requestText: z.string().trim().min(3).max(2000),
  classroomId: z.coerce.string().trim().min(1).max(64).optional(),
  topK: z.coerce.number().int().min(1).max(20).optional(),
});

export const submitFeedbackSchema = z.object({
  text: z.string().trim().min(1).max(2000),
});

export type CreatePlanningSessionBody = z.infer<typeof createPlanningSessionSchema>;
export type SubmitFeedbackBody = z.infer<typeof submitFeedbackSchema>;
