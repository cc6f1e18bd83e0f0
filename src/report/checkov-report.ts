/**
 * Checkov JSON report schema and normalization
 *
 * Checkov writes one of three shapes depending on what it scanned:
 * a single framework report, an array of framework reports, or a bare
 * summary object when there was nothing to scan.
 */

import { z } from 'zod';
import { Failure, Success, type Result } from '@/types';

const count = z.number().int().nonnegative().catch(0).default(0);

export const checkSchema = z
  .object({
    check_id: z.string().nullish(),
    check_name: z.string().nullish(),
    file_path: z.string().nullish(),
    resource: z.string().nullish(),
    severity: z.string().nullish(),
    guideline: z.string().nullish(),
  })
  .passthrough();

export type CheckovCheck = z.infer<typeof checkSchema>;

export const summarySchema = z
  .object({
    passed: count,
    failed: count,
    skipped: count,
    parsing_errors: count,
    resource_count: count,
    checkov_version: z.string().nullish(),
  })
  .passthrough();

export const frameworkReportSchema = z
  .object({
    check_type: z.string().nullish(),
    results: z
      .object({
        failed_checks: z.array(checkSchema).default([]),
      })
      .passthrough()
      .default({}),
    summary: summarySchema.default({}),
  })
  .passthrough();

export interface CheckovSummary {
  passed: number;
  failed: number;
  skipped: number;
  parsingErrors: number;
  resourceCount: number;
  checkovVersion?: string;
}

export interface CheckovReport {
  /** Frameworks present in the report, e.g. ["kubernetes"] */
  checkTypes: string[];
  summary: CheckovSummary;
  failedChecks: CheckovCheck[];
}

type FrameworkReport = z.infer<typeof frameworkReportSchema>;

function isBareSummary(raw: object): boolean {
  return !('results' in raw) && !('summary' in raw) && ('passed' in raw || 'failed' in raw);
}

function mergeReports(reports: FrameworkReport[]): CheckovReport {
  const summary: CheckovSummary = {
    passed: 0,
    failed: 0,
    skipped: 0,
    parsingErrors: 0,
    resourceCount: 0,
  };
  const failedChecks: CheckovCheck[] = [];
  const checkTypes: string[] = [];

  for (const report of reports) {
    summary.passed += report.summary.passed;
    summary.failed += report.summary.failed;
    summary.skipped += report.summary.skipped;
    summary.parsingErrors += report.summary.parsing_errors;
    summary.resourceCount += report.summary.resource_count;
    if (summary.checkovVersion === undefined && report.summary.checkov_version) {
      summary.checkovVersion = report.summary.checkov_version;
    }
    if (report.check_type) {
      checkTypes.push(report.check_type);
    }
    failedChecks.push(...report.results.failed_checks);
  }

  return { checkTypes, summary, failedChecks };
}

/**
 * Validate and normalize parsed Checkov JSON
 */
export function parseCheckovReport(raw: unknown): Result<CheckovReport> {
  let candidates: unknown[];
  if (Array.isArray(raw)) {
    candidates = raw;
  } else if (raw !== null && typeof raw === 'object' && isBareSummary(raw)) {
    candidates = [{ summary: raw }];
  } else {
    candidates = [raw];
  }

  const parsed = z.array(frameworkReportSchema).safeParse(candidates);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return Failure('Unrecognized Checkov report format', {
      message: 'Checkov JSON report did not match the expected structure',
      hint: 'The report may come from an incompatible Checkov version or a different output format',
      resolution: 'Re-run the scan with --output json and check the report file',
      details: {
        path: issue?.path.join('.') ?? '',
        issue: issue?.message ?? parsed.error.message,
      },
    });
  }

  return Success(mergeReports(parsed.data));
}
