/**
 * Application wiring
 * Builds the pipeline dependencies from configuration
 */

import type { Logger } from 'pino';
import type { AppConfig } from '@/config/index';
import { createLogger } from '@/lib/logger';
import { findManifestFiles, validateTargetDirectory } from '@/lib/manifest-discovery';
import { createManifestRenderer } from '@/infra/render/renderer';
import { createPolicyScanner } from '@/infra/security/scanner';
import { generateSummaryMarkdown } from '@/report/summary-markdown';
import type { Result } from '@/types/index';
import { runScanPipeline } from './pipeline';
import type { PipelineDependencies, PipelineOutcome, ScanOptions } from './pipeline-types';

export * from './pipeline-types';
export { runScanPipeline } from './pipeline';

export interface App {
  run(options: ScanOptions): Promise<Result<PipelineOutcome>>;
  /** Version of each external tool, or why it is unavailable */
  healthCheck(): Promise<{ renderer: Result<string>; scanner: Result<string> }>;
}

export interface CreateAppOptions {
  config: AppConfig;
  logger?: Logger;
}

export function createPipelineDependencies(config: AppConfig, logger: Logger): PipelineDependencies {
  const summaryLogger = logger.child({ component: 'report' });

  return {
    logger,
    renderer: createManifestRenderer(logger, {
      outputDir: config.paths.renderOutputDir,
      executable: config.executables.renderer,
    }),
    scanner: createPolicyScanner(logger, {
      outputDir: config.paths.scanOutputDir,
      executable: config.executables.scanner,
      timeout: config.timeouts.scan,
    }),
    summarize: (jsonReportPath, outputDir) =>
      generateSummaryMarkdown(jsonReportPath, outputDir, summaryLogger),
    discover: (basePath) => findManifestFiles(basePath, logger.child({ component: 'discovery' })),
    validateTarget: validateTargetDirectory,
  };
}

export function createApp({ config, logger }: CreateAppOptions): App {
  const log = logger ?? createLogger({ name: 'kube-manifest-scan', level: config.logLevel ?? 'info' });
  const deps = createPipelineDependencies(config, log);

  return {
    run: (options) => runScanPipeline(options, deps),

    async healthCheck() {
      const [renderer, scanner] = await Promise.all([deps.renderer.ping(), deps.scanner.ping()]);
      return { renderer, scanner };
    },
  };
}
