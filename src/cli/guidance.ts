/**
 * Contextual guidance module for CLI error handling
 * Provides troubleshooting steps based on error types
 */

import type { ErrorGuidance } from '@/types';

export interface GuidanceOptions {
  debug?: boolean;
}

/**
 * Error categories for contextual guidance
 */
const ErrorCategory = {
  MissingTool: 'missing-tool',
  Target: 'target',
  Render: 'render',
  Permission: 'permission',
} as const;
type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/**
 * Guidance messages organized by category
 */
const GUIDANCE_MESSAGES: Record<ErrorCategory, { title: string; steps: string[] }> = {
  [ErrorCategory.MissingTool]: {
    title: '💡 External tool not available:',
    steps: [
      'Check both tools at once: kube-manifest-scan --health-check',
      'Verify the executable is on PATH: which kustomize checkov',
      'Point at a specific binary with KUSTOMIZE_BIN or CHECKOV_BIN',
    ],
  },
  [ErrorCategory.Target]: {
    title: '💡 Target path issue:',
    steps: [
      'Pass a directory, not a single manifest file: --target <dir>',
      'Check the path relative to the current working directory',
    ],
  },
  [ErrorCategory.Render]: {
    title: '💡 Rendering issue:',
    steps: [
      'The target must contain a kustomization.yaml (or kustomization.yml)',
      'Reproduce outside this tool: kustomize build <target>',
      'Scan the raw manifests instead by omitting --render',
    ],
  },
  [ErrorCategory.Permission]: {
    title: '💡 Permission issue detected:',
    steps: [
      'Check file/directory permissions: ls -la',
      'Make sure the output directories are writable (SCAN_OUTPUT_DIR, RENDER_OUTPUT_DIR)',
    ],
  },
};

/**
 * General troubleshooting steps shown for all errors
 */
const GENERAL_TROUBLESHOOTING = [
  'Run health check: kube-manifest-scan --health-check',
  'Enable debug logging: --debug (or LOG_LEVEL=debug)',
  'List the files that would be scanned: --dry-run',
];

/**
 * Detect error category based on error message
 */
export function detectErrorCategory(error: Error): ErrorCategory | null {
  const message = error.message.toLowerCase();

  if (message.includes('not installed') || message.includes('enoent')) {
    return ErrorCategory.MissingTool;
  }

  if (message.includes('target directory')) {
    return ErrorCategory.Target;
  }

  if (message.includes('rendering')) {
    return ErrorCategory.Render;
  }

  if (message.includes('permission') || message.includes('eacces')) {
    return ErrorCategory.Permission;
  }

  return null;
}

/**
 * Provide contextual guidance based on error type
 * @param error - The error that occurred
 * @param guidance - Guidance attached to the failed Result, if any
 * @param options - CLI options (e.g., debug mode)
 */
export function provideContextualGuidance(
  error: Error,
  guidance?: ErrorGuidance,
  options: GuidanceOptions = {},
): void {
  console.error(`\n🔍 Error: ${error.message}`);

  if (guidance?.hint) {
    console.error(`   ${guidance.hint}`);
  }
  if (guidance?.resolution) {
    console.error(`   → ${guidance.resolution}`);
  }

  const category = detectErrorCategory(error);
  if (category) {
    const { title, steps } = GUIDANCE_MESSAGES[category];
    console.error(`\n${title}`);
    steps.forEach((step) => console.error(`  • ${step}`));
  }

  console.error('\n🛠️ General troubleshooting steps:');
  GENERAL_TROUBLESHOOTING.forEach((step, index) => {
    console.error(`  ${index + 1}. ${step}`);
  });

  if (options.debug && error.stack) {
    console.error(`\n📍 Stack trace (debug mode):`);
    console.error(error.stack);
  }
}
