/**
 * Shared constants for rendering, scanning and reporting
 */

/** File extensions treated as Kubernetes manifests */
export const MANIFEST_EXTENSIONS = ['.yaml', '.yml'] as const;

export const DEFAULT_PATHS = {
  scanOutputDir: 'checkov_output',
  renderOutputDir: 'rendered_output',
} as const;

export const OUTPUT_FILES = {
  renderedManifest: 'manifest.yaml',
  renderDirPrefix: 'render-',
  /** Checkov names its JSON report after the output format */
  scanReport: 'results_json.json',
  summaryPrefix: 'CHECKOV_SUMMARY_',
} as const;

export const EXECUTABLES = {
  renderer: 'kustomize',
  scanner: 'checkov',
} as const;

export const INSTALL_URLS = {
  kustomize: 'https://kubectl.docs.kubernetes.io/installation/kustomize/',
  checkov: 'https://www.checkov.io/2.Basics/Installing%20Checkov.html',
} as const;

export const DEFAULT_TIMEOUTS = {
  versionCheck: 15_000,
  render: 120_000,
  /** No limit; a full Kubernetes scan can take a long time */
  scan: 0,
} as const;

export const LIMITS = {
  /** Rendered overlays and scanner console output can be large */
  MAX_PROCESS_BUFFER: 64 * 1024 * 1024,
  MAX_OUTPUT_PREVIEW: 500,
} as const;
