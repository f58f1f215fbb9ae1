import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { expandInputs, runBatch, summarize, FileProcessor } from './batchRunner';
import type { UnlinkResult } from './types';
import { ExternalToolError } from '../utils/errors';

const silentLog = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe('expandInputs', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'batch-'));
    await fs.promises.mkdir(path.join(root, 'season'));
    await fs.promises.mkdir(path.join(root, 'out'));
    for (const name of ['ep01.mkv', 'ep02.mkv', 'ep03.mkv', 'cover.jpg']) {
      await fs.promises.writeFile(path.join(root, 'season', name), '');
    }
    await fs.promises.writeFile(path.join(root, 'out', 'ep02.mkv'), '');
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it('should expand directories and skip files already in the output directory', async () => {
    const files = await expandInputs([path.join(root, 'season')], path.join(root, 'out'), silentLog);

    expect(files).toEqual([path.join(root, 'season', 'ep01.mkv'), path.join(root, 'season', 'ep03.mkv')]);
  });

  it('should keep plain paths and drop duplicates', async () => {
    const single = path.join(root, 'season', 'ep01.mkv');
    const missing = path.join(root, 'nowhere.mkv');

    const files = await expandInputs([single, missing, path.join(root, 'season')], path.join(root, 'out'), silentLog);

    expect(files).toEqual([single, missing, path.join(root, 'season', 'ep03.mkv')]);
  });
});

describe('runBatch', () => {
  it('should turn thrown errors into failed results and keep order', async () => {
    const processor: FileProcessor = {
      run: async (file) => {
        if (file === '/media/b.mkv') {
          throw new ExternalToolError('mkvmerge -J /media/b.mkv', 2, 'Error: not a Matroska file');
        }
        return { status: 'skipped', file, reason: 'not linked' };
      },
    };
    const seen: number[] = [];

    const summary = await runBatch(['/media/a.mkv', '/media/b.mkv', '/media/c.mkv'], processor, {
      concurrency: 2,
      log: silentLog,
      onResult: (_result, completed) => {
        seen.push(completed);
      },
    });

    expect(summary.results.map((r) => r.status)).toEqual(['skipped', 'failed', 'skipped']);
    expect(summary.results[1]).toEqual({
      status: 'failed',
      file: '/media/b.mkv',
      error: {
        code: 'EXTERNAL_TOOL_FAILURE',
        message: 'Command failed with code 2: mkvmerge -J /media/b.mkv',
      },
    });
    expect(seen).toEqual([1, 2, 3]);
    expect(silentLog.error).toHaveBeenCalledWith('b.mkv: Command failed with code 2: mkvmerge -J /media/b.mkv');
  });

  it('should keep going when recording a result fails', async () => {
    const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const processor: FileProcessor = {
      run: async (file) => ({ status: 'skipped', file, reason: 'not linked' }),
    };

    const summary = await runBatch(['/media/a.mkv', '/media/b.mkv', '/media/c.mkv'], processor, {
      concurrency: 1,
      log,
      onResult: async (result) => {
        if (result.file === '/media/a.mkv') throw new Error('ENOSPC: no space left on device');
      },
    });

    expect(summary.results.map((r) => r.file)).toEqual(['/media/a.mkv', '/media/b.mkv', '/media/c.mkv']);
    expect(summary.skipped).toBe(3);
    expect(log.error).toHaveBeenCalledWith('a.mkv: recording the result failed: ENOSPC: no space left on device');
  });

  it('should run at most the configured number of files at once', async () => {
    let running = 0;
    let peak = 0;
    const processor: FileProcessor = {
      run: async (file) => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
        return { status: 'skipped', file, reason: 'not linked' };
      },
    };

    await runBatch(['/a.mkv', '/b.mkv', '/c.mkv', '/d.mkv'], processor, { concurrency: 2, log: silentLog });

    expect(peak).toBe(2);
  });
});

describe('summarize', () => {
  it('should count each outcome', () => {
    const results: UnlinkResult[] = [
      { status: 'unlinked', file: '/a.mkv', output: '/out/a.mkv', parts: ['/a.mkv'], splitPoints: [] },
      { status: 'skipped', file: '/b.mkv', reason: 'not linked' },
      { status: 'failed', file: '/c.mkv', error: { code: 'UNKNOWN', message: 'boom' } },
      { status: 'unlinked', file: '/d.mkv', output: '/out/d.mkv', parts: ['/d.mkv'], splitPoints: [] },
    ];

    expect(summarize(results)).toEqual({ results, unlinked: 2, skipped: 1, failed: 1 });
  });
});
