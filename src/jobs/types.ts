import type { BatchSummary, UnlinkResult } from '../pipelines/types';
import type { LogLevelName } from '../config';

/**
 * Possible job status values
 */
export type JobStatus = 'pending' | 'expanding' | 'processing' | 'completed' | 'failed';

export interface JobLogEntry {
  timestamp: Date;
  level: LogLevelName;
  message: string;
  /** File the entry is about, when it came from a per-file pipeline */
  scope?: string;
}

/**
 * Detailed progress information for a job
 */
export interface JobProgress {
  currentStep: string;
  processedFiles: number;
  totalFiles: number;
  startedAt?: Date;
  logs: JobLogEntry[];
}

/**
 * Complete job definition
 */
export interface Job {
  id: string;
  /** Files and directories as submitted */
  paths: string[];
  status: JobStatus;
  progress: JobProgress;

  // One entry per settled file, in completion order
  results: UnlinkResult[];
  summary?: Omit<BatchSummary, 'results'>;

  // Metadata
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
  error?: string;
}

/**
 * Job creation request
 */
export interface CreateJobRequest {
  paths: string[];
}

/**
 * Job list response
 */
export interface JobListItem {
  id: string;
  status: JobStatus;
  pathCount: number;
  failedFiles: number;
  createdAt: Date;
  progress: number; // 0-100 overall
}

/**
 * Calculates overall progress percentage from job status
 */
export function calculateOverallProgress(job: Job): number {
  switch (job.status) {
    case 'pending':
    case 'expanding':
      return 0;
    case 'completed':
      return 100;
    default: {
      const { processedFiles, totalFiles } = job.progress;
      if (totalFiles === 0) return 0;
      return Math.min(99, Math.round((processedFiles / totalFiles) * 100));
    }
  }
}
