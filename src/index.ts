import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import fs from 'fs';
import apiRouter from './api';
import { config } from './config';
import { logger } from './utils/logger';
import { UnlinkError, UnlinkErrorCode } from './utils/errors';

const STATUS_BY_CODE: Partial<Record<UnlinkErrorCode, number>> = {
  NOT_FOUND: 404,
  INVALID_TEMPLATE: 400,
  NO_SUCH_EDITION: 400,
};

// Ensure data directories exist
const dirs = [config.dataDir, config.jobsDir, config.outputDir, config.tmpDir];
for (const dir of dirs) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

const app = express();

// Middleware
app.use(cors());
app.use(express.json());

// API routes
app.use('/api', apiRouter);

// Error handling middleware
app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  logger.error(`Error: ${err.message}`);

  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Invalid JSON body' });
    return;
  }

  if (err instanceof UnlinkError) {
    res.status(STATUS_BY_CODE[err.code] ?? 422).json({ error: err.message, code: err.code });
    return;
  }

  res.status(500).json({
    error: config.nodeEnv === 'development' ? err.message : 'Internal server error',
  });
});

// 404 handler
app.use((_req: Request, res: Response) => {
  res.status(404).json({ error: 'Not found' });
});

// Start server
const port = config.port;

app.listen(port, () => {
  console.info(`\n🎞️  Segment Unlinker`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`   Output directory: ${config.outputDir}`);
  console.info(`\n   API Endpoints:`);
  console.info(`   - GET    /api/health          - Check tool availability`);
  console.info(`   - GET    /api/jobs            - List all jobs`);
  console.info(`   - POST   /api/jobs            - Create new job`);
  console.info(`   - GET    /api/jobs/:id        - Get job details`);
  console.info(`   - POST   /api/jobs/:id/start  - Start processing`);
  console.info(`   - DELETE /api/jobs/:id        - Delete a job`);
  console.info(`\n`);
});

export default app;
