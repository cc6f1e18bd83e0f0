/**
 * Kustomize Renderer Implementation
 *
 * Expands a kustomize base or overlay into a single multi-document
 * manifest file that the scanner can consume.
 *
 * @see https://kubectl.docs.kubernetes.io/references/kustomize/
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import type { Logger } from 'pino';

import { DEFAULT_PATHS, DEFAULT_TIMEOUTS, EXECUTABLES, INSTALL_URLS, OUTPUT_FILES } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import { runCommand } from '@/lib/process';
import { fileTimestamp } from '@/lib/timestamp';
import { Failure, Success, type Result } from '@/types';
import { checkToolAvailability, ToolErrors } from '@/infra/security/scanner-common';

export interface RenderedManifest {
  /** Path of the written manifest file */
  path: string;
  /** Number of non-empty YAML documents in the render */
  resourceCount: number;
  /** Distinct resource kinds, sorted */
  kinds: string[];
}

export interface KustomizeOptions {
  /** Parent directory for timestamped render directories */
  outputDir?: string;
  /** kustomize executable name or path */
  executable?: string;
  /** Clock used for the render directory name */
  now?: () => Date;
}

/**
 * Check if kustomize is installed and accessible
 */
export async function checkKustomizeAvailability(
  logger: Logger,
  executable: string = EXECUTABLES.renderer,
): Promise<Result<string>> {
  return checkToolAvailability(
    {
      name: 'Kustomize',
      executable,
      // Older releases print a Go struct, newer ones a bare "v5.x.y"
      versionArgs: ['version'],
      installUrl: INSTALL_URLS.kustomize,
    },
    logger,
  );
}

/**
 * Count documents and collect kinds in rendered YAML.
 * Returns an empty summary when the output is not parseable YAML.
 */
export function summarizeManifest(content: string): Pick<RenderedManifest, 'resourceCount' | 'kinds'> {
  const documents = yaml.loadAll(content);
  const kinds = new Set<string>();
  let resourceCount = 0;

  for (const doc of documents) {
    if (doc === null || doc === undefined) continue;
    resourceCount++;
    if (typeof doc === 'object' && 'kind' in doc && typeof doc.kind === 'string') {
      kinds.add(doc.kind);
    }
  }

  return { resourceCount, kinds: [...kinds].sort() };
}

/**
 * Render a kustomize base or overlay into
 * `<outputDir>/render-<timestamp>/manifest.yaml`
 */
export async function renderKustomize(
  targetPath: string,
  logger: Logger,
  options: KustomizeOptions = {},
): Promise<Result<RenderedManifest>> {
  const executable = options.executable ?? EXECUTABLES.renderer;

  const availability = await checkKustomizeAvailability(logger, executable);
  if (!availability.ok) {
    return Failure(availability.error, availability.guidance);
  }

  const timestamp = fileTimestamp((options.now ?? (() => new Date()))());
  const renderDir = path.join(
    options.outputDir ?? DEFAULT_PATHS.renderOutputDir,
    `${OUTPUT_FILES.renderDirPrefix}${timestamp}`,
  );
  const outputFile = path.join(renderDir, OUTPUT_FILES.renderedManifest);

  logger.info({ target: targetPath, version: availability.value }, 'Rendering manifests with kustomize');

  try {
    const args = ['build', targetPath];
    logger.debug({ executable, args }, 'Executing kustomize command');

    const { exitCode, stdout, stderr } = await runCommand(executable, args, {
      timeout: DEFAULT_TIMEOUTS.render,
    });

    if (exitCode !== 0) {
      logger.error({ exitCode, stderr }, 'Kustomize rendering failed');
      return ToolErrors.renderFailed(targetPath, stderr);
    }

    await fs.mkdir(renderDir, { recursive: true });
    await fs.writeFile(outputFile, stdout, 'utf-8');

    let summary: Pick<RenderedManifest, 'resourceCount' | 'kinds'> = { resourceCount: 0, kinds: [] };
    try {
      summary = summarizeManifest(stdout);
    } catch (parseError) {
      logger.debug({ error: extractErrorMessage(parseError) }, 'Rendered output is not parseable YAML');
    }

    logger.debug({ outputFile, ...summary }, 'Rendered output saved');

    return Success({ path: outputFile, ...summary });
  } catch (error) {
    const errorMessage = extractErrorMessage(error);
    logger.error({ error: errorMessage, target: targetPath }, 'Kustomize rendering failed');
    return ToolErrors.executionError('Kustomize', errorMessage);
  }
}
