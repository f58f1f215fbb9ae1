import { Router } from 'express';
import jobsRouter from './jobs';
import healthRouter from './health';

const router = Router();

router.use('/jobs', jobsRouter);
router.use('/health', healthRouter);

export default router;
