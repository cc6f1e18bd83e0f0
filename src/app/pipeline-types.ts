/**
 * Pipeline Types
 * Options, dependencies and outcomes of a scan run
 */

import type { Logger } from 'pino';
import type { Result } from '@/types/index';
import type { ManifestRenderer, RenderedManifest } from '@/infra/render/renderer';
import type { PolicyScanner } from '@/infra/security/scanner';

export interface ScanOptions {
  /** Directory containing manifests or a kustomization */
  target: string;
  /** List what would be scanned without running the scanner */
  dryRun: boolean;
  /** Render and stop */
  renderOnly: boolean;
  /** Render before scanning */
  render: boolean;
}

export interface PipelineDependencies {
  logger: Logger;
  renderer: ManifestRenderer;
  scanner: PolicyScanner;
  /** Writes the Markdown summary; returns its path */
  summarize: (jsonReportPath: string, outputDir: string) => Promise<Result<string>>;
  /** Lists manifest files under a directory */
  discover: (basePath: string) => Promise<string[]>;
  /** Validates the scan target */
  validateTarget: (target: string) => Promise<Result<string>>;
}

export const PIPELINE_MODE = {
  RENDER_ONLY: 'render-only',
  DRY_RUN: 'dry-run',
  SCAN: 'scan',
} as const;
export type PipelineMode = (typeof PIPELINE_MODE)[keyof typeof PIPELINE_MODE];

export type PipelineOutcome =
  | {
      mode: typeof PIPELINE_MODE.RENDER_ONLY;
      rendered: RenderedManifest;
    }
  | {
      mode: typeof PIPELINE_MODE.DRY_RUN;
      files: string[];
    }
  | {
      mode: typeof PIPELINE_MODE.SCAN;
      scanPath: string;
      scannerExitCode: number;
      jsonReportPath: string;
      /** Absent when the report could not be summarized */
      summaryPath?: string;
      rendered?: RenderedManifest;
    };
