/**
 * Checkov Policy Scanner Implementation
 *
 * Runs Checkov's Kubernetes framework against a manifest file or directory
 * and leaves its JSON report on disk for summarizing.
 *
 * @see https://www.checkov.io/
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';

import { DEFAULT_PATHS, DEFAULT_TIMEOUTS, EXECUTABLES, INSTALL_URLS, OUTPUT_FILES } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import { runCommand } from '@/lib/process';
import { Failure, Success, type Result } from '@/types';
import { checkToolAvailability, logScanComplete, logScanStart, ToolErrors } from './scanner-common';

export interface CheckovScanResult {
  /** Scanner exit code; non-zero means violations or a scanner error */
  exitCode: number;
  scanPath: string;
  outputDir: string;
  jsonReportPath: string;
}

export interface CheckovOptions {
  /** Directory Checkov writes its report into */
  outputDir?: string;
  /** checkov executable name or path */
  executable?: string;
  /** Milliseconds before the scan is killed; 0 or unset means no limit */
  timeout?: number;
}

/**
 * Build the Checkov argument list.
 *
 * --soft-fail: exit 0 even with failed checks
 * --output-file-path: write the JSON report into outputDir instead of stdout
 */
export function buildCheckovArgs(scanPath: string, isFile: boolean, outputDir: string): string[] {
  return [
    '--framework',
    'kubernetes',
    '--quiet',
    '--compact',
    '--soft-fail',
    isFile ? '--file' : '--directory',
    scanPath,
    '--output',
    'json',
    '--output-file-path',
    outputDir,
  ];
}

/**
 * Check if Checkov is installed and accessible
 */
export async function checkCheckovAvailability(
  logger: Logger,
  executable: string = EXECUTABLES.scanner,
): Promise<Result<string>> {
  return checkToolAvailability(
    {
      name: 'Checkov',
      executable,
      versionArgs: ['--version'],
      installUrl: INSTALL_URLS.checkov,
    },
    logger,
  );
}

async function isRegularFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    // Missing paths are passed through as directories; Checkov reports them
    return false;
  }
}

/**
 * Scan a manifest file or directory with Checkov
 */
export async function runCheckovScan(
  scanPath: string,
  logger: Logger,
  options: CheckovOptions = {},
): Promise<Result<CheckovScanResult>> {
  const executable = options.executable ?? EXECUTABLES.scanner;
  const outputDir = options.outputDir ?? DEFAULT_PATHS.scanOutputDir;
  const timeout = options.timeout ?? DEFAULT_TIMEOUTS.scan;

  const availability = await checkCheckovAvailability(logger, executable);
  if (!availability.ok) {
    return Failure(availability.error, availability.guidance);
  }

  logScanStart(logger, 'Checkov', availability.value, scanPath);

  try {
    await fs.mkdir(outputDir, { recursive: true });

    const args = buildCheckovArgs(scanPath, await isRegularFile(scanPath), outputDir);
    logger.debug({ executable, args }, 'Executing Checkov command');

    const { exitCode, stdout, stderr } = await runCommand(executable, args, {
      ...(timeout > 0 && { timeout }),
    });

    if (stdout) {
      logger.debug({ stdout }, 'Checkov stdout output');
    }
    if (stderr) {
      logger.debug({ stderr }, 'Checkov stderr output');
    }

    logScanComplete(logger, 'Checkov', scanPath, exitCode);

    const jsonReportPath = path.join(outputDir, OUTPUT_FILES.scanReport);
    logger.info({ jsonReportPath }, 'JSON report written');

    return Success({ exitCode, scanPath, outputDir, jsonReportPath });
  } catch (error) {
    const errorMessage = extractErrorMessage(error);
    logger.error({ error: errorMessage, scanPath }, 'Checkov scan failed');
    return ToolErrors.executionError('Checkov', errorMessage);
  }
}
