/**
 * Logger factory
 *
 * Structured JSON logs go to stderr so stdout stays free for
 * the listings the CLI prints.
 */

import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Level names pino does not use but users commonly set */
const LOG_LEVEL_ALIASES: Readonly<Record<string, LogLevel>> = {
  warning: 'warn',
  critical: 'fatal',
  notset: 'trace',
};

/**
 * Map a LOG_LEVEL value onto a pino level; undefined when unrecognized
 */
export function normalizeLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return undefined;
  if (isLogLevel(normalized)) return normalized;
  return LOG_LEVEL_ALIASES[normalized];
}

/**
 * Resolve the effective log level.
 * The debug flag wins over the LOG_LEVEL environment variable;
 * unrecognized values fall back to info.
 */
export function resolveLogLevel(debug: boolean, envLevel?: string): LogLevel {
  if (debug) return 'debug';
  return normalizeLogLevel(envLevel) ?? 'info';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'kube-manifest-scan',
      level: options.level ?? 'info',
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
  );
}
