import { Router } from 'express';

import { createLearner, deleteLearner, getLearnerById, getLearners, updateLearner } from './learner.controller';

const router = Router();

router.get('/', getLearners);
router.get('/:id', getLearnerById);
router.post('/', createLearner);
router.put('/:id', updateLearner);
router.delete('/:id', deleteLearner);

export { router as learnerRoutes };
