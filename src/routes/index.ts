import { Router } from 'express';

import { env } from '../config/env';
import { classroomRoutes } from '../modules/classroom/classroom.routes';
import { groupingRoutes } from '../modules/grouping/grouping.routes';
import { healthRoutes } from '../modules/health/health.routes';
import { learnerRoutes } from '../modules/learner/learner.routes';
import { libraryRoutes } from '../modules/library/library.routes';
import { planningRoutes } from '../modules/planning/planning.routes';

const router = Router();

router.use('/health', healthRoutes);
router.use('/planning-sessions', planningRoutes);
router.use('/grouping', groupingRoutes);
router.use('/library', libraryRoutes);

// Roster management needs the database; the file driver reads data/roster.json instead.
if (env.STORAGE_DRIVER === 'postgres') {
  router.use('/classrooms', classroomRoutes);
  router.use('/learners', learnerRoutes);
}

export { router as apiRoutes };
