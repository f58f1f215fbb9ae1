import { jobStore, JobStore } from '../jobs/jobStore';
import { config } from '../config';
import { describeError, UnlinkError } from '../utils/errors';
import { logger, LogEntry } from '../utils/logger';
import { expandInputs, FileProcessor, runBatch } from './batchRunner';
import { createMediaToolkit } from './mediaToolkit';
import type { BatchSummary } from './types';
import { toUnlinkOptions, UnlinkPipeline } from './unlinkPipeline';

export interface JobPipelineOptions {
  store?: JobStore;
  /**
   * Builds the processor for one job; a fresh one per job keeps directory scans scoped to it.
   * Per-file log scopes must start with `${logScope}/`.
   */
  createProcessor?: (logScope: string) => FileProcessor;
  concurrency?: number;
  outputDir?: string;
}

/**
 * Runs a stored batch job and keeps its record current
 */
export class JobPipeline {
  private store: JobStore;
  private createProcessor: (logScope: string) => FileProcessor;
  private concurrency: number;
  private outputDir: string;

  constructor(options: JobPipelineOptions = {}) {
    this.store = options.store ?? jobStore;
    this.createProcessor =
      options.createProcessor ??
      ((logScope) => new UnlinkPipeline(createMediaToolkit(), toUnlinkOptions(), undefined, logScope));
    this.concurrency = options.concurrency ?? config.batchConcurrency;
    this.outputDir = options.outputDir ?? config.outputDir;
  }

  /**
   * Runs the complete batch for a job
   */
  async run(jobId: string): Promise<BatchSummary> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new UnlinkError(`Job ${jobId} not found`, 'NOT_FOUND');
    }

    const log = logger.child(`job ${jobId}`);
    const pending: LogEntry[] = [];

    // Collect what this job and its files log, to be stored with the job
    const unsubscribe = logger.subscribe((entry) => {
      if (entry.level === 'debug' || !entry.scope) return;
      if (entry.scope === log.scope || entry.scope.startsWith(`${log.scope}/`)) {
        pending.push(entry);
      }
    });
    const flushLogs = () => this.store.appendLogs(jobId, pending.splice(0));

    try {
      // Stage 1: Expand directories into files
      await this.store.updateStatus(jobId, 'expanding', 'Collecting input files');
      const files = await expandInputs(job.paths, this.outputDir, log);

      await this.store.setTotalFiles(jobId, files.length);
      await this.store.updateStatus(jobId, 'processing', `Processing ${files.length} file(s)`);
      log.info(`${files.length} file(s) to process`);

      // Stage 2: Unlink every file
      const summary = await runBatch(files, this.createProcessor(log.scope), {
        concurrency: this.concurrency,
        log,
        onResult: async (result, completed) => {
          await this.store.recordResult(jobId, result, completed);
          await flushLogs();
        },
      });

      await flushLogs();
      await this.store.complete(jobId, summary);
      return summary;
    } catch (error) {
      await flushLogs();
      await this.store.setFailed(jobId, describeError(error).message);
      throw error;
    } finally {
      unsubscribe();
    }
  }
}

// Singleton instance
export const jobPipeline = new JobPipeline();
