import fs from 'fs';
import path from 'path';
import { listContainerFiles } from '../segments/segmentRegistry';
import { mapInParallel } from '../utils/concurrency';
import { describeError } from '../utils/errors';
import { logger, LogSink } from '../utils/logger';
import type { BatchSummary, UnlinkResult } from './types';

export interface BatchOptions {
  concurrency: number;
  log?: LogSink;
  /** Called after each file settles, in completion order */
  onResult?: (result: UnlinkResult, completed: number, total: number) => void | Promise<void>;
}

/**
 * Anything that can process one file. UnlinkPipeline in production.
 */
export interface FileProcessor {
  run(file: string): Promise<UnlinkResult>;
}

/**
 * Expands directories into their Matroska files, leaving out files that
 * already exist in the output directory. Plain paths are kept as given.
 */
export async function expandInputs(
  inputs: string[],
  outputDir: string,
  log: LogSink = logger
): Promise<string[]> {
  const files: string[] = [];

  for (const input of inputs) {
    const resolved = path.resolve(input);
    const stats = await fs.promises.stat(resolved).catch(() => null);

    if (!stats?.isDirectory()) {
      files.push(resolved);
      continue;
    }

    for (const file of await listContainerFiles(resolved)) {
      if (fs.existsSync(path.join(outputDir, path.basename(file)))) {
        log.info(`skipping ${path.basename(file)}, already in output directory`);
        continue;
      }
      files.push(file);
    }
  }

  return Array.from(new Set(files));
}

export function summarize(results: UnlinkResult[]): BatchSummary {
  return {
    results,
    unlinked: results.filter((r) => r.status === 'unlinked').length,
    skipped: results.filter((r) => r.status === 'skipped').length,
    failed: results.filter((r) => r.status === 'failed').length,
  };
}

/**
 * Runs every file through the processor. A failure is recorded against its
 * file and never stops the rest of the batch.
 */
export async function runBatch(
  files: string[],
  processor: FileProcessor,
  options: BatchOptions
): Promise<BatchSummary> {
  const log = options.log ?? logger;
  let completed = 0;

  const results = await mapInParallel(files, options.concurrency, async (file) => {
    let result: UnlinkResult;
    try {
      result = await processor.run(file);
    } catch (error) {
      const failure = describeError(error);
      log.error(`${path.basename(file)}: ${failure.message}`);
      result = { status: 'failed', file, error: failure };
    }

    completed++;
    try {
      await options.onResult?.(result, completed, files.length);
    } catch (error) {
      log.error(`${path.basename(file)}: recording the result failed: ${describeError(error).message}`);
    }
    return result;
  });

  const summary = summarize(results);
  log.info(`${summary.unlinked} unlinked, ${summary.skipped} skipped, ${summary.failed} failed`);
  return summary;
}
