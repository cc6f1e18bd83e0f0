/**
 * Shared Runtime Logging - Run Start/Outcome/Failure Reporting
 *
 * Structured records go to the pino logger; the human-facing lines
 * go to the console. Dry-run listings are the command's result and
 * are written to stdout, everything else to stderr.
 */

import type { Logger } from 'pino';
import type { PipelineOutcome, ScanOptions } from '@/app/pipeline-types';
import type { Result } from '@/types';

/**
 * Run startup information
 */
export interface StartupInfo {
  /** Application name */
  appName: string;
  /** Application version */
  version: string;
  /** Effective log level */
  logLevel: string;
  options: ScanOptions;
}

/**
 * Log run start in a consistent format
 */
export function logStartup(info: StartupInfo, logger: Logger): void {
  logger.info(
    {
      version: info.version,
      logLevel: info.logLevel,
      target: info.options.target,
      dryRun: info.options.dryRun,
      render: info.options.render,
      renderOnly: info.options.renderOnly,
    },
    `Starting ${info.appName}`,
  );
}

/**
 * Report a successful pipeline outcome
 */
export function logRunOutcome(outcome: PipelineOutcome, logger: Logger): void {
  switch (outcome.mode) {
    case 'render-only':
      logger.info({ outputFile: outcome.rendered.path }, 'Render-only mode complete');
      console.error(`✅ Render-only mode complete. Output saved to: ${outcome.rendered.path}`);
      console.error(
        `📦 ${outcome.rendered.resourceCount} resource(s)` +
          (outcome.rendered.kinds.length > 0 ? `: ${outcome.rendered.kinds.join(', ')}` : ''),
      );
      break;

    case 'dry-run':
      logger.info({ count: outcome.files.length }, 'Dry run complete');
      console.log('[DRY RUN] YAML files discovered:');
      outcome.files.forEach((file) => console.log(`  ${file}`));
      console.log(`[DRY RUN] Total: ${outcome.files.length} file(s)`);
      break;

    case 'scan':
      logger.info(
        {
          scanPath: outcome.scanPath,
          scannerExitCode: outcome.scannerExitCode,
          jsonReportPath: outcome.jsonReportPath,
          summaryPath: outcome.summaryPath,
        },
        'Scan complete',
      );
      if (outcome.scannerExitCode === 0) {
        console.error('✅ Checkov scan completed with no policy violations.');
      } else {
        console.error(
          `⚠️  Checkov completed with violations (exit code ${outcome.scannerExitCode}).`,
        );
      }
      console.error(`📄 JSON Report: ${outcome.jsonReportPath}`);
      if (outcome.summaryPath) {
        console.error(`📝 Summary: ${outcome.summaryPath}`);
      }
      break;
  }
}

/**
 * Log a failed run
 */
export function logRunFailure(error: Error, logger: Logger): void {
  logger.error({ error: error.message }, 'Scan run failed');
  console.error('❌ Scan run failed');
}

/**
 * Print tool availability from a health check
 */
export function logHealthCheck(
  results: { renderer: Result<string>; scanner: Result<string> },
  logger: Logger,
): boolean {
  const healthy = results.renderer.ok && results.scanner.ok;
  logger.info({ healthy }, 'Health check complete');

  console.error('🏥 Health Check Results');
  console.error('═'.repeat(40));

  const line = (name: string, result: Result<string>): string =>
    result.ok ? `  ✅ ${name}: v${result.value}` : `  ❌ ${name}: ${result.error}`;
  console.error(line('Kustomize', results.renderer));
  console.error(line('Checkov', results.scanner));

  for (const result of [results.renderer, results.scanner]) {
    if (!result.ok && result.guidance?.resolution) {
      console.error(`     → ${result.guidance.resolution}`);
    }
  }

  return healthy;
}

/**
 * Route uncaught errors through the logger before exiting
 */
export function installProcessHandlers(logger: Logger): void {
  process.on('uncaughtException', (error) => {
    logger.fatal({ error: error.message }, 'Uncaught exception');
    console.error('❌ Uncaught exception:', error.message);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    console.error('❌ Unhandled rejection:', reason);
    process.exit(1);
  });
}
