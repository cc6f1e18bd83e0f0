/**
 * Check severity normalization and counting
 */

export const SEVERITY_ORDER = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFO', 'UNKNOWN'] as const;

export type CheckSeverity = (typeof SEVERITY_ORDER)[number];

/**
 * Normalize a severity string to our standard format.
 * Checkov reports null severity unless a platform API key is configured.
 */
export function normalizeSeverity(severity: string | null | undefined): CheckSeverity {
  switch (severity?.trim().toUpperCase()) {
    case 'CRITICAL':
      return 'CRITICAL';
    case 'HIGH':
      return 'HIGH';
    case 'MEDIUM':
      return 'MEDIUM';
    case 'LOW':
      return 'LOW';
    case 'INFO':
      return 'INFO';
    default:
      return 'UNKNOWN';
  }
}

/**
 * Severity counter helper
 */
export class SeverityCounter {
  private readonly counts = new Map<CheckSeverity, number>();

  increment(severity: CheckSeverity): void {
    this.counts.set(severity, this.get(severity) + 1);
  }

  get(severity: CheckSeverity): number {
    return this.counts.get(severity) ?? 0;
  }

  get total(): number {
    let sum = 0;
    for (const value of this.counts.values()) sum += value;
    return sum;
  }

  /** Non-zero counts in severity order */
  entries(): Array<[CheckSeverity, number]> {
    return SEVERITY_ORDER.filter((severity) => this.get(severity) > 0).map((severity) => [
      severity,
      this.get(severity),
    ]);
  }
}
