import type { RequestHandler } from 'express';

import { searchLibraryQuerySchema } from './library.schema';
import { libraryService } from './library.service';

export const searchLibrary: RequestHandler = async (req, res, next) => {
  try {
    const query = searchLibraryQuerySchema.parse(req.query);
    const response = await libraryService.searchActivities(query);
    res.status(200).json(response);
  } catch (error: unknown) {
    next(error);
  }
};
