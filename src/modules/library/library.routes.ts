import { Router } from 'express';

import { searchLibrary } from './library.controller';

const router = Router();

router.get('/search', searchLibrary);

export { router as libraryRoutes };
