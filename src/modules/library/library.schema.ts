import { z } from 'zod';

export const searchLibraryQuerySchema = z.object({
  q: z.string().trim().min(1).max(2000),
  k: z.coerce.number().int().min(1).max(20).optional(),
});

export type SearchLibraryQuery = z.infer<typeof searchLibraryQuerySchema>;
