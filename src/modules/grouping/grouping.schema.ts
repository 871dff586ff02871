import { z } from 'zod';

export const createGroupingSchema = z
  .object({
    mode: z.enum(['individual', 'pair', 'group']),
    groupSize: z.coerce.number().int().min(1).max(20).optional(),
    classroomId: z.coerce.string().trim().min(1).max(64).optional(),
    focusSubject: z.string().trim().min(1).max(80).optional(),
  })
  .refine((value) => value.mode !== 'group' || value.groupSize === undefined || value.groupSize >= 2, {
    message: 'Group mode needs a groupSize of at least 2.',
    path: ['groupSize'],
  });

export type CreateGroupingBody = z.infer<typeof createGroupingSchema>;
