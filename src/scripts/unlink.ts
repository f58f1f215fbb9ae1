#!/usr/bin/env node
/**
 * Unlinks files and directories given on the command line.
 * Run with: npm run unlink -- <file-or-directory>...
 *
 * Behaviour is taken from the environment (see .env.example).
 */

import fs from 'fs';
import { config } from '../config';
import { MkvToolnix } from '../mkvtoolnix';
import { createMediaToolkit, expandInputs, runBatch, toUnlinkOptions, UnlinkPipeline } from '../pipelines';
import type { UnlinkResult } from '../pipelines';
import { logger } from '../utils/logger';

function describeResult(result: UnlinkResult): string {
  switch (result.status) {
    case 'unlinked':
      return `unlinked  ${result.file} -> ${result.output}`;
    case 'skipped':
      return `skipped   ${result.file} (${result.reason})`;
    case 'failed':
      return `failed    ${result.file}: [${result.error.code}] ${result.error.message}`;
  }
}

async function main(): Promise<number> {
  const inputs = process.argv.slice(2).filter((arg) => arg.trim() !== '');

  if (inputs.length === 0) {
    console.error('Usage: segment-unlink <file-or-directory>...');
    return 2;
  }

  const mkvtoolnix = new MkvToolnix();
  if (!mkvtoolnix.isAvailable()) {
    logger.error('MKVToolNix is not available. Install it or set MKVMERGE_PATH, MKVEXTRACT_PATH and MKVPROPEDIT_PATH.');
    return 1;
  }

  for (const dir of [config.outputDir, config.tmpDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const files = await expandInputs(inputs, config.outputDir);
  logger.info(`${files.length} file(s) to process`);

  const pipeline = new UnlinkPipeline(createMediaToolkit(mkvtoolnix), toUnlinkOptions());
  const summary = await runBatch(files, pipeline, { concurrency: config.batchConcurrency });

  console.info('\nSummary');
  for (const result of summary.results) {
    console.info(`  ${describeResult(result)}`);
  }
  console.info(`\n  ${summary.unlinked} unlinked, ${summary.skipped} skipped, ${summary.failed} failed`);

  return summary.failed > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
