import { describe, it, expect, vi } from 'vitest';
import { readToolVersion, runCommand } from './process';
import { ExternalToolError } from './errors';

const silentLog = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
const node = process.execPath;

describe('runCommand', () => {
  it('should resolve with stdout on success', async () => {
    const output = await runCommand(node, ['-e', "process.stdout.write('segment ok')"], { log: silentLog });

    expect(output).toBe('segment ok');
  });

  it('should reject with the exit code and output on failure', async () => {
    const run = runCommand(node, ['-e', "process.stderr.write('bad file'); process.exit(3)"], {
      log: silentLog,
    });

    await expect(run).rejects.toBeInstanceOf(ExternalToolError);
    await expect(run).rejects.toMatchObject({ exitCode: 3, output: 'bad file', code: 'EXTERNAL_TOOL_FAILURE' });
  });

  it('should accept warning exit codes', async () => {
    const output = await runCommand(node, ['-e', "process.stdout.write('done'); process.exit(1)"], {
      log: silentLog,
      warningExitCodes: [1],
    });

    expect(output).toBe('done');
    expect(silentLog.warn).toHaveBeenCalledTimes(1);
  });

  it('should reject when the command cannot be started', async () => {
    await expect(runCommand('definitely-not-a-real-tool', ['--version'], { log: silentLog })).rejects.toThrow(
      /^Failed to start command: /
    );
  });
});

describe('readToolVersion', () => {
  it('should return the first line of the banner', () => {
    expect(readToolVersion(node, '--version')).toBe(process.version);
  });

  it('should return null when the tool is missing', () => {
    expect(readToolVersion('definitely-not-a-real-tool', '--version')).toBeNull();
  });
});
