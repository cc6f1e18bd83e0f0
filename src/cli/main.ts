/**
 * CLI flow: parse options, run the pipeline and map the outcome to an exit code
 */

import { createApp } from '@/app';
import { loadConfig, type AppConfig } from '@/config/index';
import { createLogger, resolveLogLevel } from '@/lib/logger';
import { extractErrorMessage } from '@/lib/errors';
import {
  installProcessHandlers,
  logHealthCheck,
  logRunFailure,
  logRunOutcome,
  logStartup,
} from '@/lib/runtime-logging';
import { provideContextualGuidance } from './guidance';
import { parseCliOptions, readPackageInfo, type CliRequest } from './program';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

function applyOverrides(config: AppConfig, request: CliRequest): AppConfig {
  if (request.command !== 'scan') return config;
  return {
    ...config,
    paths: {
      scanOutputDir: request.outputDir ?? config.paths.scanOutputDir,
      renderOutputDir: request.renderDir ?? config.paths.renderOutputDir,
    },
  };
}

/**
 * Scanner violations still exit 0; only failures of this tool exit 1.
 */
export async function runCli(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<ExitCode> {
  const parsed = parseCliOptions(args);
  if (!parsed.ok) {
    provideContextualGuidance(new Error(parsed.error), parsed.guidance);
    return EXIT_CODES.FAILURE;
  }
  const request = parsed.value;

  const level = resolveLogLevel(request.debug, env.LOG_LEVEL);
  const logger = createLogger({ name: 'cli', level });
  installProcessHandlers(logger);

  try {
    const config = applyOverrides({ ...loadConfig(env), logLevel: level }, request);
    const app = createApp({ config, logger });

    if (request.command === 'health-check') {
      const healthy = logHealthCheck(await app.healthCheck(), logger);
      return healthy ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
    }

    const { name, version } = readPackageInfo();
    logStartup({ appName: name, version, logLevel: level, options: request.scan }, logger);

    const result = await app.run(request.scan);
    if (!result.ok) {
      logRunFailure(new Error(result.error), logger);
      provideContextualGuidance(new Error(result.error), result.guidance, { debug: request.debug });
      return EXIT_CODES.FAILURE;
    }

    logRunOutcome(result.value, logger);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(extractErrorMessage(error));
    logRunFailure(err, logger);
    provideContextualGuidance(err, undefined, { debug: request.debug });
    return EXIT_CODES.FAILURE;
  }
}
