import { Router } from 'express';
import sessionsRouter from './sessions';
import healthRouter from './health';

const router = Router();

router.use('/sessions', sessionsRouter);
router.use('/health', healthRouter);

export default router;
