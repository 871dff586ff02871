import { Router } from 'express';

import { createGrouping } from './grouping.controller';

const router = Router();

router.post('/', createGrouping);

export { router as groupingRoutes };
