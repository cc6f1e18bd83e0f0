/**
 * Subprocess execution
 *
 * Wraps execFile so callers get the exit code back instead of a rejection.
 * Arguments are passed as an array; no shell is involved.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { LIMITS } from '@/config/constants';
import { getErrorCode } from './errors';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  timeout?: number;
  cwd?: string;
  maxBuffer?: number;
}

function readStream(error: object, key: 'stdout' | 'stderr'): string {
  if (key in error) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'string') return value;
  }
  return '';
}

/**
 * Run an executable and resolve with its exit code and captured output.
 *
 * Rejects only when the process could not be run at all
 * (executable missing, permission denied, timeout, buffer overflow).
 */
export async function runCommand(
  file: string,
  args: readonly string[],
  options: RunCommandOptions = {},
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(file, [...args], {
      encoding: 'utf8',
      maxBuffer: options.maxBuffer ?? LIMITS.MAX_PROCESS_BUFFER,
      ...(options.timeout !== undefined && { timeout: options.timeout }),
      ...(options.cwd !== undefined && { cwd: options.cwd }),
    });
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    const code = getErrorCode(error);
    // Numeric code means the process ran and exited non-zero
    if (typeof code === 'number' && error !== null && typeof error === 'object') {
      return {
        exitCode: code,
        stdout: readStream(error, 'stdout'),
        stderr: readStream(error, 'stderr'),
      };
    }
    throw error;
  }
}

/**
 * True when the error means the executable was not found or not runnable
 */
export function isMissingExecutableError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === 'ENOENT' || code === 'EACCES';
}
