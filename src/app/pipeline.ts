/**
 * Scan Pipeline
 *
 * validate target → (render) → (list files) → scan → summarize
 *
 * Precedence when several modes are requested:
 * render-only > render > dry-run > plain scan.
 * A rendered scan always runs; --dry-run only applies to raw manifests.
 */

import { Failure, Success, type Result } from '@/types/index';
import type { RenderedManifest } from '@/infra/render/renderer';
import { PIPELINE_MODE, type PipelineDependencies, type PipelineOutcome, type ScanOptions } from './pipeline-types';

async function scanAndSummarize(
  scanPath: string,
  deps: PipelineDependencies,
  rendered?: RenderedManifest,
): Promise<Result<PipelineOutcome>> {
  const scanResult = await deps.scanner.scan(scanPath);
  if (!scanResult.ok) {
    return Failure(scanResult.error, scanResult.guidance);
  }

  const { exitCode, jsonReportPath, outputDir } = scanResult.value;
  const summary = await deps.summarize(jsonReportPath, outputDir);
  if (!summary.ok) {
    // The raw JSON report is still on disk; a missing summary does not fail the run
    deps.logger.error({ error: summary.error, jsonReportPath }, 'Summary generation skipped');
  }

  return Success({
    mode: PIPELINE_MODE.SCAN,
    scanPath,
    scannerExitCode: exitCode,
    jsonReportPath,
    ...(summary.ok && { summaryPath: summary.value }),
    ...(rendered !== undefined && { rendered }),
  });
}

export async function runScanPipeline(
  options: ScanOptions,
  deps: PipelineDependencies,
): Promise<Result<PipelineOutcome>> {
  const { logger } = deps;

  const target = await deps.validateTarget(options.target);
  if (!target.ok) {
    logger.error({ target: options.target }, target.error);
    return Failure(target.error, target.guidance);
  }

  logger.debug({ options }, 'Arguments parsed');

  if (options.renderOnly || options.render) {
    const rendered = await deps.renderer.render(target.value);
    if (!rendered.ok) {
      return Failure(rendered.error, rendered.guidance);
    }

    logger.info(
      { outputFile: rendered.value.path, resources: rendered.value.resourceCount },
      'Manifests rendered',
    );

    if (options.renderOnly) {
      return Success({ mode: PIPELINE_MODE.RENDER_ONLY, rendered: rendered.value });
    }
    if (options.dryRun) {
      logger.debug('Dry run has no effect on a rendered scan');
    }
    return scanAndSummarize(rendered.value.path, deps, rendered.value);
  }

  const files = await deps.discover(target.value);
  logger.debug({ count: files.length }, 'Manifest files discovered');

  if (options.dryRun) {
    return Success({ mode: PIPELINE_MODE.DRY_RUN, files });
  }

  return scanAndSummarize(target.value, deps);
}
