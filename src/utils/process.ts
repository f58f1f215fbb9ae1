import { spawn, execFileSync } from 'child_process';
import { ExternalToolError } from './errors';
import { logger, LogSink } from './logger';

export interface RunCommandOptions {
  cwd?: string;
  log?: LogSink;
  /** Non-zero exit codes that still count as success, logged as warnings */
  warningExitCodes?: number[];
}

/**
 * Signature shared by every tool wrapper so tests can swap the process layer
 */
export type CommandRunner = (command: string, args: string[], options?: RunCommandOptions) => Promise<string>;

function describeCommand(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? `"${part}"` : part)).join(' ');
}

/**
 * Runs a command with the given arguments
 * @returns stdout once the process exits with code 0
 */
export function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<string> {
  const log = options.log ?? logger;
  const commandLine = describeCommand(command, args);
  log.debug(`$ ${commandLine}`);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd: options.cwd, stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      if (code === 0) {
        resolve(stdout);
        return;
      }
      if (code !== null && options.warningExitCodes?.includes(code)) {
        log.warn(`command finished with warnings (${code}): ${commandLine}\n${stdout.trim()}`);
        resolve(stdout);
        return;
      }
      const output = [stdout, stderr].filter(Boolean).join('\n');
      log.error(`command failed (${code}): ${commandLine}\n${output}`);
      reject(new ExternalToolError(commandLine, code, output));
    });

    child.on('error', (err) => {
      log.error(`failed to start: ${commandLine}: ${err.message}`);
      reject(new ExternalToolError(commandLine, null, err.message, `Failed to start command: ${err.message}`));
    });
  });
}

/**
 * Reads a tool's version banner synchronously
 * @returns First line of output, or null when the tool cannot be run
 */
export function readToolVersion(command: string, versionFlag: string): string | null {
  try {
    const output = execFileSync(command, [versionFlag], { encoding: 'utf-8', stdio: 'pipe' });
    return output.split('\n')[0]?.trim() || null;
  } catch {
    return null;
  }
}
