/**
 * Environment configuration
 *
 * Values come from the environment and are validated with zod;
 * CLI flags override them in the CLI layer.
 */

import { z } from 'zod';
import { normalizeLogLevel, type LogLevel } from '@/lib/logger';
import { DEFAULT_PATHS, DEFAULT_TIMEOUTS, EXECUTABLES } from './constants';

const nonEmpty = z.string().trim().min(1);

export const envSchema = z.object({
  /** Unrecognized levels are dropped so the logger falls back to info */
  LOG_LEVEL: z.string().transform(normalizeLogLevel).optional(),
  SCAN_OUTPUT_DIR: nonEmpty.default(DEFAULT_PATHS.scanOutputDir),
  RENDER_OUTPUT_DIR: nonEmpty.default(DEFAULT_PATHS.renderOutputDir),
  KUSTOMIZE_BIN: nonEmpty.default(EXECUTABLES.renderer),
  CHECKOV_BIN: nonEmpty.default(EXECUTABLES.scanner),
  /** Milliseconds; 0 lets Checkov run as long as it needs */
  SCAN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(DEFAULT_TIMEOUTS.scan),
});

export interface AppConfig {
  logLevel?: LogLevel;
  paths: {
    scanOutputDir: string;
    renderOutputDir: string;
  };
  executables: {
    renderer: string;
    scanner: string;
  };
  timeouts: {
    scan: number;
  };
}

/**
 * Load configuration from environment variables.
 * Blank values fall back to their defaults.
 *
 * @throws Error when SCAN_TIMEOUT_MS is not a non-negative integer
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }
  const parsed = result.data;

  return {
    ...(parsed.LOG_LEVEL !== undefined && { logLevel: parsed.LOG_LEVEL }),
    paths: {
      scanOutputDir: parsed.SCAN_OUTPUT_DIR,
      renderOutputDir: parsed.RENDER_OUTPUT_DIR,
    },
    executables: {
      renderer: parsed.KUSTOMIZE_BIN,
      scanner: parsed.CHECKOV_BIN,
    },
    timeouts: {
      scan: parsed.SCAN_TIMEOUT_MS,
    },
  };
}
