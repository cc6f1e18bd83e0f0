/**
 * kube-manifest-scan public API
 */

export { createApp, createPipelineDependencies, runScanPipeline } from './app';
export type {
  App,
  CreateAppOptions,
  PipelineDependencies,
  PipelineMode,
  PipelineOutcome,
  ScanOptions,
} from './app';
export { PIPELINE_MODE } from './app';

export { loadConfig, type AppConfig } from './config/index';
export { createLogger, resolveLogLevel, type LogLevel } from './lib/logger';
export { findManifestFiles, validateTargetDirectory } from './lib/manifest-discovery';

export { createManifestRenderer, type ManifestRenderer } from './infra/render/renderer';
export { renderKustomize, type RenderedManifest } from './infra/render/kustomize';
export { createPolicyScanner, type PolicyScanner } from './infra/security/scanner';
export { buildCheckovArgs, runCheckovScan, type CheckovScanResult } from './infra/security/checkov-scanner';

export { parseCheckovReport, type CheckovReport, type CheckovCheck } from './report/checkov-report';
export { generateSummaryMarkdown, renderSummaryMarkdown } from './report/summary-markdown';

export { Success, Failure, type Result, type ErrorGuidance } from './types';
