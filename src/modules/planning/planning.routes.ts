import { Router } from 'express';

import {
  abandonPlanningSession,
  acceptPlanningSession,
  createPlanningSession,
  getPlanningSession,
  submitFeedback,
} from './planning.controller';

const router = Router();

router.post('/', createPlanningSession);
router.get('/:id', getPlanningSession);
router.post('/:id/feedback', submitFeedback);
router.post('/:id/accept', acceptPlanningSession);
router.delete('/:id', abandonPlanningSession);

export { router as planningRoutes };
