/**
 * Markdown summary of a Checkov scan
 *
 * renderSummaryMarkdown is a pure transformation; generateSummaryMarkdown
 * reads the JSON report and writes the summary file next to it.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';

import { OUTPUT_FILES } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import { displayTimestamp, fileTimestamp } from '@/lib/timestamp';
import { Failure, Success, type Result } from '@/types';
import { parseCheckovReport, type CheckovCheck, type CheckovReport } from './checkov-report';
import { normalizeSeverity, SeverityCounter } from './severity';

function formatCheck(check: CheckovCheck): string {
  const lines = [
    `### ${check.check_id || 'UNKNOWN'} - ${check.check_name || 'Unnamed Check'}`,
    `- **File:** \`${check.file_path || 'unknown'}\``,
    `- **Resource:** \`${check.resource || 'unknown'}\``,
    `- **Severity:** ${check.severity || 'N/A'}`,
  ];
  if (check.guideline) {
    lines.push(`- **Guideline:** [${check.guideline}](${check.guideline})`);
  }
  return `${lines.join('\n')}\n\n`;
}

export function countBySeverity(checks: readonly CheckovCheck[]): SeverityCounter {
  const counter = new SeverityCounter();
  for (const check of checks) {
    counter.increment(normalizeSeverity(check.severity));
  }
  return counter;
}

/**
 * Render the summary document for a parsed report
 */
export function renderSummaryMarkdown(report: CheckovReport, generatedAt: Date): string {
  const { summary, failedChecks } = report;

  let md = '# Checkov Scan Summary\n\n';
  md += '## Scan Metadata\n';
  md += `- **Timestamp:** ${displayTimestamp(generatedAt)}\n`;
  md += `- **Passed Checks:** ${summary.passed}\n`;
  md += `- **Failed Checks:** ${summary.failed}\n`;
  md += `- **Skipped Checks:** ${summary.skipped}\n`;
  md += `- **Parsing Errors:** ${summary.parsingErrors}\n`;
  md += `- **Resources Scanned:** ${summary.resourceCount}\n`;
  md += `- **Checkov Version:** ${summary.checkovVersion ?? 'N/A'}\n\n`;

  if (failedChecks.length === 0) {
    return md;
  }

  md += '## Failed Checks by Severity\n';
  for (const [severity, total] of countBySeverity(failedChecks).entries()) {
    md += `- **${severity}:** ${total}\n`;
  }
  md += '\n';

  md += '## Failed Checks Detail\n\n';
  for (const check of failedChecks) {
    md += formatCheck(check);
  }

  return md;
}

/**
 * Read a Checkov JSON report and write CHECKOV_SUMMARY_<timestamp>.md into outputDir
 *
 * @returns path of the written summary
 */
export async function generateSummaryMarkdown(
  jsonPath: string,
  outputDir: string,
  logger: Logger,
  now: Date = new Date(),
): Promise<Result<string>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(jsonPath, 'utf-8'));
  } catch (error) {
    const reason = extractErrorMessage(error);
    logger.error({ jsonPath, error: reason }, 'Failed to read JSON report');
    return Failure(`Failed to read JSON report: ${reason}`, {
      message: 'Checkov JSON report could not be read',
      hint: 'Checkov may have exited before writing its report',
      resolution: 'Re-run with --debug to see the scanner output',
      details: { jsonPath },
    });
  }

  const report = parseCheckovReport(raw);
  if (!report.ok) {
    logger.error({ jsonPath, error: report.error }, 'Failed to parse JSON report');
    return Failure(report.error, report.guidance);
  }

  const summaryFile = path.join(
    outputDir,
    `${OUTPUT_FILES.summaryPrefix}${fileTimestamp(now)}.md`,
  );

  try {
    await fs.mkdir(outputDir, { recursive: true });
    await fs.writeFile(summaryFile, renderSummaryMarkdown(report.value, now), 'utf-8');
  } catch (error) {
    const reason = extractErrorMessage(error);
    logger.error({ summaryFile, error: reason }, 'Failed to write summary Markdown');
    return Failure(`Failed to write summary Markdown: ${reason}`);
  }

  logger.info({ summaryFile }, 'Summary Markdown generated');
  return Success(summaryFile);
}
