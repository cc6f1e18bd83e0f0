/**
 * Command-line program definition and option validation
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { Failure, Success, type Result } from '@/types';
import type { ScanOptions } from '@/app/pipeline-types';

// src/cli/ and dist/cli/ both sit two levels below the package root
const packageJsonPath = join(__dirname, '../../package.json');

const packageJsonSchema = z.object({ name: z.string(), version: z.string() });

export function readPackageInfo(): z.infer<typeof packageJsonSchema> {
  return packageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
}

const rawOptionsSchema = z.object({
  target: z.string().trim().min(1, 'Target path cannot be empty').optional(),
  dryRun: z.boolean().default(false),
  debug: z.boolean().default(false),
  renderOnly: z.boolean().default(false),
  render: z.boolean().default(false),
  outputDir: z.string().trim().min(1, 'Output directory cannot be empty').optional(),
  renderDir: z.string().trim().min(1, 'Render directory cannot be empty').optional(),
  healthCheck: z.boolean().default(false),
});

export type CliRequest =
  | { command: 'health-check'; debug: boolean }
  | {
      command: 'scan';
      debug: boolean;
      scan: ScanOptions;
      outputDir?: string;
      renderDir?: string;
    };

export function createProgram(version = readPackageInfo().version): Command {
  return new Command()
    .name('kube-manifest-scan')
    .description('Scan Kubernetes configuration directories using Checkov')
    .version(version)
    .option('--target <path>', 'path to the directory containing Kubernetes manifests')
    .option('--dry-run', 'print the files that would be scanned without running Checkov')
    .option('--debug', 'enable debug output')
    .option('--render-only', 'only render manifests with kustomize, without scanning')
    .option('--render', 'render manifests with kustomize before scanning')
    .option('--output-dir <path>', 'directory for the Checkov JSON report and summary')
    .option('--render-dir <path>', 'parent directory for rendered manifests')
    .option('--health-check', 'check that kustomize and checkov are installed and exit')
    .addHelpText(
      'after',
      `

Examples:
  $ kube-manifest-scan --target ./k8s                  Scan raw manifests
  $ kube-manifest-scan --target ./k8s --dry-run        List the files that would be scanned
  $ kube-manifest-scan --target ./overlays/prod --render
                                                       Render the overlay, then scan it
  $ kube-manifest-scan --target ./overlays/prod --render-only
  $ kube-manifest-scan --health-check                  Check external tools

Environment Variables:
  LOG_LEVEL            Logging level (debug, info, warn, error); --debug overrides
  SCAN_OUTPUT_DIR      Report directory (default: checkov_output)
  RENDER_OUTPUT_DIR    Rendered manifest directory (default: rendered_output)
  KUSTOMIZE_BIN        kustomize executable (default: kustomize)
  CHECKOV_BIN          checkov executable (default: checkov)
  SCAN_TIMEOUT_MS      Kill Checkov after this many milliseconds (default: 0, no limit)
`,
    );
}

/**
 * Parse argv into a validated request.
 * Commander handles --help and --version itself.
 */
export function parseCliOptions(argv: readonly string[], program = createProgram()): Result<CliRequest> {
  program.parse([...argv]);

  const parsed = rawOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return Failure('Invalid command-line options', {
      message: errors.join('; '),
      resolution: 'Use --help for usage information',
      details: { errors },
    });
  }

  const opts = parsed.data;

  if (opts.healthCheck) {
    const request: CliRequest = { command: 'health-check', debug: opts.debug };
    return Success(request);
  }

  if (opts.target === undefined) {
    return Failure('Missing required option --target <path>', {
      message: 'No scan target given',
      resolution: 'Pass the manifest directory with --target <path>',
    });
  }

  const request: CliRequest = {
    command: 'scan',
    debug: opts.debug,
    scan: {
      target: opts.target,
      dryRun: opts.dryRun,
      renderOnly: opts.renderOnly,
      render: opts.render,
    },
    ...(opts.outputDir !== undefined && { outputDir: opts.outputDir }),
    ...(opts.renderDir !== undefined && { renderDir: opts.renderDir }),
  };
  return Success(request);
}
