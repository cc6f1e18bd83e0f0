/**
 * Common External Tool Utilities
 *
 * Shared failure messages, version probing and scan logging for the
 * renderer and scanner integrations.
 */

import type { Logger } from 'pino';
import { Failure, Success, type Result } from '@/types';
import { DEFAULT_TIMEOUTS, LIMITS } from '@/config/constants';
import { extractErrorMessage, getErrorCode } from '@/lib/errors';
import { isMissingExecutableError, runCommand } from '@/lib/process';

/**
 * Common error messages and guidance for external tool integrations
 */
export const ToolErrors = {
  /**
   * Create tool not installed error
   */
  notInstalled: (toolName: string, installUrl: string): Result<never> =>
    Failure(`${toolName} not installed or not in PATH`, {
      message: `${toolName} CLI not found`,
      hint: `${toolName} CLI is required for this operation`,
      resolution: `Install ${toolName}: ${installUrl}`,
    }),

  /**
   * Create version check timeout error
   */
  versionCheckTimeout: (toolName: string, command: string): Result<never> =>
    Failure(`${toolName} version check timed out`, {
      message: 'Command execution timeout',
      hint: `${toolName} CLI took too long to respond`,
      resolution: `Check if ${toolName} is functioning correctly: ${command}`,
    }),

  /**
   * Create version parse error
   */
  versionParseError: (toolName: string, command: string): Result<never> =>
    Failure(`${toolName} version could not be parsed`, {
      message: `${toolName} version check failed`,
      hint: `${toolName} CLI may not be properly configured`,
      resolution: `Try running: ${command}`,
    }),

  /**
   * Create render failure error
   */
  renderFailed: (target: string, stderr: string): Result<never> =>
    Failure(`Kustomize rendering failed: ${stderr.trim() || 'no error output'}`, {
      message: 'Manifest rendering failed',
      hint: 'The target must contain a kustomization.yaml whose resources resolve',
      resolution: `Reproduce with: kustomize build ${target}`,
      details: { target, stderr: stderr.substring(0, LIMITS.MAX_OUTPUT_PREVIEW) },
    }),

  /**
   * Create execution error for a tool that could not be run to completion
   */
  executionError: (toolName: string, errorMessage: string): Result<never> =>
    Failure(`${toolName} execution failed: ${errorMessage}`, {
      message: `${toolName} could not complete`,
      hint: `${toolName} was interrupted or produced more output than allowed`,
      resolution: `Run ${toolName} manually with the same arguments to inspect its output`,
      details: { error: errorMessage },
    }),
};

/**
 * Parse version from tool output using a regex pattern
 */
export function parseVersion(output: string, pattern: RegExp): string | undefined {
  const match = output.match(pattern);
  return match?.[1]?.trim();
}

/** Matches "5.4.2", "v5.4.2" and "kustomize/v4.5.7" */
export const SEMVER_PATTERN = /v?(\d+\.\d+\.\d+(?:[-+][\w.]+)?)/;

export interface ToolProbe {
  /** Display name, used in messages */
  name: string;
  executable: string;
  versionArgs: readonly string[];
  installUrl: string;
  pattern?: RegExp;
}

/**
 * Check that a tool is installed by asking for its version
 */
export async function checkToolAvailability(
  probe: ToolProbe,
  logger: Logger,
): Promise<Result<string>> {
  const command = [probe.executable, ...probe.versionArgs].join(' ');
  try {
    const { exitCode, stdout, stderr } = await runCommand(probe.executable, probe.versionArgs, {
      timeout: DEFAULT_TIMEOUTS.versionCheck,
    });
    if (exitCode !== 0) {
      logger.debug({ exitCode, stderr }, `${probe.name} version command exited non-zero`);
      return ToolErrors.versionParseError(probe.name, command);
    }
    const version = parseVersion(`${stdout}\n${stderr}`, probe.pattern ?? SEMVER_PATTERN);
    if (!version) {
      logger.debug({ stdout }, `Could not parse ${probe.name} version from output`);
      return ToolErrors.versionParseError(probe.name, command);
    }
    return Success(version);
  } catch (error) {
    if (isMissingExecutableError(error)) {
      return ToolErrors.notInstalled(probe.name, probe.installUrl);
    }
    if (getErrorCode(error) === 'ETIMEDOUT' || isKilled(error)) {
      logger.error({ error: extractErrorMessage(error) }, `${probe.name} version check timed out`);
      return ToolErrors.versionCheckTimeout(probe.name, command);
    }
    return ToolErrors.executionError(probe.name, extractErrorMessage(error));
  }
}

function isKilled(error: unknown): boolean {
  return error !== null && typeof error === 'object' && 'killed' in error && error.killed === true;
}

/**
 * Log scanner start
 */
export function logScanStart(logger: Logger, scanner: string, version: string, scanPath: string): void {
  logger.info({ scanner, version, scanPath }, `Starting ${scanner} scan`);
}

/**
 * Log scan completion
 */
export function logScanComplete(
  logger: Logger,
  scanner: string,
  scanPath: string,
  exitCode: number,
): void {
  if (exitCode === 0) {
    logger.info({ scanner, scanPath, exitCode }, `${scanner} scan completed with no policy violations`);
  } else {
    logger.warn(
      { scanner, scanPath, exitCode },
      `${scanner} completed with violations (exit code ${exitCode})`,
    );
  }
}
