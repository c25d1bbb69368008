import { Router } from 'express';
import healthRouter from './health';
import simulationsRouter from './simulations';

const router = Router();
router.use(healthRouter);
router.use('/simulations', simulationsRouter);

export default router;
