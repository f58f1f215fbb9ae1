import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { Job, JobStatus, CreateJobRequest, JobListItem, JobLogEntry, calculateOverallProgress } from './types';
import type { BatchSummary, UnlinkResult } from '../pipelines/types';
import { config, LogLevelName } from '../config';
import { UNLINK_ERROR_CODES, UnlinkError } from '../utils/errors';
import { logger, LogEntry } from '../utils/logger';

const MAX_LOGS = 100;

const resultSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('unlinked'),
    file: z.string(),
    output: z.string(),
    parts: z.array(z.string()),
    splitPoints: z.array(z.string()),
  }),
  z.object({ status: z.literal('skipped'), file: z.string(), reason: z.string() }),
  z.object({
    status: z.literal('failed'),
    file: z.string(),
    error: z.object({ code: z.enum(UNLINK_ERROR_CODES), message: z.string() }),
  }),
]);

const jobSchema = z.object({
  id: z.string(),
  paths: z.array(z.string()),
  status: z.enum(['pending', 'expanding', 'processing', 'completed', 'failed']),
  progress: z.object({
    currentStep: z.string(),
    processedFiles: z.number(),
    totalFiles: z.number(),
    startedAt: z.coerce.date().optional(),
    logs: z.array(
      z.object({
        timestamp: z.coerce.date(),
        level: z.enum(['debug', 'info', 'warn', 'error']),
        message: z.string(),
        scope: z.string().optional(),
      })
    ),
  }),
  results: z.array(resultSchema),
  summary: z
    .object({ unlinked: z.number(), skipped: z.number(), failed: z.number() })
    .optional(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  completedAt: z.coerce.date().optional(),
  error: z.string().optional(),
});

/**
 * Simple file-based job store.
 * Every mutation is a synchronous read-modify-write, so concurrent
 * per-file callbacks of one batch never overwrite each other.
 */
export class JobStore {
  private jobsDir: string;

  constructor(jobsDir?: string) {
    this.jobsDir = jobsDir ?? config.jobsDir;
  }

  private ensureDirectory(): void {
    if (!fs.existsSync(this.jobsDir)) {
      fs.mkdirSync(this.jobsDir, { recursive: true });
    }
  }

  private getJobPath(jobId: string): string {
    return path.join(this.jobsDir, `${jobId}.json`);
  }

  private read(jobId: string): Job | null {
    const jobPath = this.getJobPath(jobId);

    if (!fs.existsSync(jobPath)) {
      return null;
    }

    try {
      const content = fs.readFileSync(jobPath, 'utf-8');
      return jobSchema.parse(JSON.parse(content));
    } catch (error) {
      logger.error(`Failed to read job ${jobId}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  private write(job: Job): void {
    this.ensureDirectory();
    job.updatedAt = new Date();
    fs.writeFileSync(this.getJobPath(job.id), JSON.stringify(job, null, 2), 'utf-8');
  }

  private mutate(jobId: string, change: (job: Job) => void): Job {
    const job = this.read(jobId);
    if (!job) {
      throw new UnlinkError(`Job ${jobId} not found`, 'NOT_FOUND');
    }

    change(job);
    this.write(job);
    return job;
  }

  /**
   * Creates a new job
   */
  async create(request: CreateJobRequest): Promise<Job> {
    const now = new Date();

    const job: Job = {
      id: uuidv4(),
      paths: request.paths,
      status: 'pending',
      progress: {
        currentStep: 'Waiting to start',
        processedFiles: 0,
        totalFiles: 0,
        logs: [],
      },
      results: [],
      createdAt: now,
      updatedAt: now,
    };

    this.write(job);
    return job;
  }

  /**
   * Gets a job by ID
   */
  async get(jobId: string): Promise<Job | null> {
    return this.read(jobId);
  }

  /**
   * Saves a job
   */
  async save(job: Job): Promise<void> {
    this.write(job);
  }

  /**
   * Updates job status and the step shown to clients
   */
  async updateStatus(jobId: string, status: JobStatus, currentStep: string): Promise<void> {
    this.mutate(jobId, (job) => {
      if (job.status === 'pending' && status !== 'pending') {
        job.progress.startedAt = new Date();
      }
      job.status = status;
      job.progress.currentStep = currentStep;
    });
  }

  /**
   * Sets the number of files the batch will process
   */
  async setTotalFiles(jobId: string, totalFiles: number): Promise<void> {
    this.mutate(jobId, (job) => {
      job.progress.totalFiles = totalFiles;
    });
  }

  /**
   * Records the outcome of one file
   */
  async recordResult(jobId: string, result: UnlinkResult, processedFiles: number): Promise<void> {
    this.mutate(jobId, (job) => {
      job.results.push(result);
      job.progress.processedFiles = processedFiles;
      job.progress.currentStep = `Processed ${processedFiles} of ${job.progress.totalFiles} file(s)`;
    });
  }

  /**
   * Marks the batch as finished. Files that failed are counted in the summary;
   * they do not fail the job.
   */
  async complete(jobId: string, summary: BatchSummary): Promise<void> {
    this.mutate(jobId, (job) => {
      job.status = 'completed';
      job.summary = { unlinked: summary.unlinked, skipped: summary.skipped, failed: summary.failed };
      job.progress.currentStep = 'Completed';
      job.completedAt = new Date();
    });
  }

  /**
   * Sets job as failed with error message
   */
  async setFailed(jobId: string, error: string): Promise<void> {
    this.mutate(jobId, (job) => {
      job.status = 'failed';
      job.error = error;
      job.completedAt = new Date();
      pushLogs(job, [{ timestamp: new Date(), level: 'error', message: `Batch failed: ${error}` }]);
    });
  }

  /**
   * Adds a log entry to a job
   */
  async addLog(jobId: string, level: LogLevelName, message: string, scope?: string): Promise<void> {
    await this.appendLogs(jobId, [{ timestamp: new Date().toISOString(), level, message, scope }]);
  }

  /**
   * Appends logger entries to a job. Unknown jobs are ignored.
   */
  async appendLogs(jobId: string, entries: LogEntry[]): Promise<void> {
    if (entries.length === 0 || !this.read(jobId)) return;

    this.mutate(jobId, (job) => {
      pushLogs(
        job,
        entries.map((entry) => ({
          timestamp: new Date(entry.timestamp),
          level: entry.level,
          message: entry.message,
          scope: entry.scope,
        }))
      );
    });
  }

  /**
   * Lists all jobs
   */
  async list(): Promise<JobListItem[]> {
    this.ensureDirectory();
    const files = fs.readdirSync(this.jobsDir).filter((f) => f.endsWith('.json'));

    const jobs: JobListItem[] = [];

    for (const file of files) {
      const job = this.read(file.replace('.json', ''));

      if (job) {
        jobs.push({
          id: job.id,
          status: job.status,
          pathCount: job.paths.length,
          failedFiles: job.results.filter((r) => r.status === 'failed').length,
          createdAt: job.createdAt,
          progress: calculateOverallProgress(job),
        });
      }
    }

    // Sort by creation date, newest first
    return jobs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Deletes a job record. Output files are left in place.
   */
  async delete(jobId: string): Promise<boolean> {
    const jobPath = this.getJobPath(jobId);

    if (!fs.existsSync(jobPath)) {
      return false;
    }

    fs.unlinkSync(jobPath);
    return true;
  }
}

function pushLogs(job: Job, entries: JobLogEntry[]): void {
  job.progress.logs.push(...entries);

  // Keep only the most recent entries
  if (job.progress.logs.length > MAX_LOGS) {
    job.progress.logs = job.progress.logs.slice(-MAX_LOGS);
  }
}

// Singleton instance
export const jobStore = new JobStore();
