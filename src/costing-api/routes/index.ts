import { Router } from 'express';
import healthRouter from './health';
import { catalogRouter } from './catalog';
import analysesRouter from './analyses';

const router = Router();
router.use(healthRouter);
router.use('/catalog', catalogRouter);
router.use('/analyses', analysesRouter);

export default router;
