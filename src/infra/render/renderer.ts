import type { Logger } from 'pino';
import { Failure, Success, type Result } from '@/types';
import {
  checkKustomizeAvailability,
  renderKustomize,
  type KustomizeOptions,
  type RenderedManifest,
} from './kustomize';

export type { RenderedManifest } from './kustomize';

export interface ManifestRenderer {
  render: (targetPath: string) => Promise<Result<RenderedManifest>>;
  ping: () => Promise<Result<string>>;
}

/**
 * Create a kustomize-backed manifest renderer
 */
export function createManifestRenderer(logger: Logger, options: KustomizeOptions = {}): ManifestRenderer {
  const log = logger.child({ component: 'renderer' });

  return {
    async render(targetPath: string): Promise<Result<RenderedManifest>> {
      return renderKustomize(targetPath, log, options);
    },

    async ping(): Promise<Result<string>> {
      const result = await checkKustomizeAvailability(log, options.executable);
      if (result.ok) {
        log.debug({ version: result.value }, 'Kustomize renderer available');
        return Success(result.value);
      }
      return Failure(result.error, result.guidance);
    },
  };
}
