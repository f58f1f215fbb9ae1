export { JobStore, jobStore } from './jobStore';
export { calculateOverallProgress } from './types';
export type { Job, JobStatus, JobProgress, JobLogEntry, CreateJobRequest, JobListItem } from './types';
