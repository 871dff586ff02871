import type { RequestHandler } from 'express';

import type { CreateGroupingBody } from './grouping.schema';
import { createGroupingSchema } from './grouping.schema';
import { groupingService } from './grouping.service';

export const createGrouping: RequestHandler<never, unknown, CreateGroupingBody> = async (req, res, next) => {
  try {
    const payload = createGroupingSchema.parse(req.body);
    const response = await groupingService.assign(payload);
    res.status(200).json(response);
  } catch (error: unknown) {
    next(error);
  }
};
