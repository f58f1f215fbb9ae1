import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { jobStore, calculateOverallProgress } from '../jobs';
import { jobPipeline } from '../pipelines';
import { logger } from '../utils/logger';
import { describeError } from '../utils/errors';

const router = Router();

const createJobSchema = z.object({
  paths: z.array(z.string().trim().min(1)).min(1),
});

/**
 * Error handler wrapper
 */
const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

/**
 * GET /api/jobs
 * List all jobs
 */
router.get(
  '/',
  asyncHandler(async (_req: Request, res: Response) => {
    const jobs = await jobStore.list();
    res.json({ jobs });
  })
);

/**
 * POST /api/jobs
 * Create a new job from files and directories on the server
 */
router.post(
  '/',
  asyncHandler(async (req: Request, res: Response) => {
    const parsed = createJobSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: 'paths must be a non-empty array of file or directory paths',
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return;
    }

    const job = await jobStore.create(parsed.data);
    res.status(201).json({ job });
  })
);

/**
 * GET /api/jobs/:id
 * Get job details
 */
router.get(
  '/:id',
  asyncHandler(async (req: Request, res: Response) => {
    const job = await jobStore.get(req.params.id ?? '');

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    const overallProgress = calculateOverallProgress(job);
    res.json({ job, overallProgress });
  })
);

/**
 * POST /api/jobs/:id/start
 * Start processing a job
 */
router.post(
  '/:id/start',
  asyncHandler(async (req: Request, res: Response) => {
    const jobId = req.params.id ?? '';
    const job = await jobStore.get(jobId);

    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    if (job.status !== 'pending') {
      res.status(400).json({ error: 'Job has already been started' });
      return;
    }

    // Start the batch in background
    jobPipeline.run(jobId).catch((error: unknown) => {
      logger.error(`Batch failed for job ${jobId}: ${describeError(error).message}`);
    });

    res.json({ message: 'Job started', jobId });
  })
);

/**
 * DELETE /api/jobs/:id
 * Delete a job
 */
router.delete(
  '/:id',
  asyncHandler(async (req: Request, res: Response) => {
    const job = await jobStore.get(req.params.id ?? '');

    if (job && (job.status === 'expanding' || job.status === 'processing')) {
      res.status(409).json({ error: 'Job is still running' });
      return;
    }

    const deleted = await jobStore.delete(req.params.id ?? '');

    if (!deleted) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    res.json({ message: 'Job deleted' });
  })
);

export default router;
