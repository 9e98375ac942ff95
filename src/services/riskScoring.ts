/**
 * Severity-weighted risk scoring for finding groups and whole scans
 */
import { maxSeverity, type Finding, type RiskSummary, type Severity } from '../core/types.js';

export const SEVERITY_SCORES: Record<Severity, number> = {
  CRITICAL: 100,
  HIGH: 75,
  MEDIUM: 50,
  LOW: 25,
} as const;

const MAX_VOLUME_MULTIPLIER = 1.5;
const VOLUME_STEP = 0.1;

export function countFailed(findings: readonly Finding[]): number {
  return findings.filter(f => f.status === 'FAIL').length;
}

/**
 * Highest severity across all members, passing ones included
 */
export function highestSeverity(findings: readonly Finding[]): Severity {
  return findings.reduce<Severity>((acc, f) => maxSeverity(acc, f.severity), 'LOW');
}

/**
 * Group score in [0, 100]. Zero when nothing fails; otherwise the base score of
 * the group's max severity, scaled by 10% per extra failing resource up to 1.5x.
 */
export function scoreGroup(findings: readonly Finding[], severity: Severity = highestSeverity(findings)): number {
  const failed = countFailed(findings);
  if (failed === 0) return 0;

  const multiplier = Math.min(1 + VOLUME_STEP * (failed - 1), MAX_VOLUME_MULTIPLIER);
  return Math.min(Math.trunc(SEVERITY_SCORES[severity] * multiplier), 100);
}

interface SeverityCounts {
  critical: number;
  high: number;
  medium: number;
  low: number;
  passed: number;
}

function countBySeverity(findings: readonly Finding[]): SeverityCounts {
  const counts: SeverityCounts = { critical: 0, high: 0, medium: 0, low: 0, passed: 0 };
  for (const f of findings) {
    if (f.status === 'PASS') {
      counts.passed++;
      continue;
    }
    switch (f.severity) {
      case 'CRITICAL':
        counts.critical++;
        break;
      case 'HIGH':
        counts.high++;
        break;
      case 'MEDIUM':
        counts.medium++;
        break;
      case 'LOW':
        counts.low++;
        break;
    }
  }
  return counts;
}

export function summaryText(counts: SeverityCounts): string {
  const failed = counts.critical + counts.high + counts.medium + counts.low;
  const total = failed + counts.passed;

  if (failed === 0) {
    return `All ${total} security checks passed.`;
  }

  const parts: string[] = [];
  if (counts.critical > 0) parts.push(`${counts.critical} critical`);
  if (counts.high > 0) parts.push(`${counts.high} high`);
  if (counts.medium > 0) parts.push(`${counts.medium} medium`);
  if (counts.low > 0) parts.push(`${counts.low} low`);

  return `Found ${failed} security issues (${parts.join(', ')} severity) out of ${total} total checks. ${counts.passed} checks passed.`;
}

/**
 * Scan-wide summary over the ungrouped finding set
 */
export function calculateRiskSummary(findings: readonly Finding[]): RiskSummary {
  const counts = countBySeverity(findings);
  const failed = counts.critical + counts.high + counts.medium + counts.low;

  let overallScore = 0;
  let riskLevel: Severity = 'LOW';
  if (failed > 0) {
    const weighted =
      counts.critical * SEVERITY_SCORES.CRITICAL +
      counts.high * SEVERITY_SCORES.HIGH +
      counts.medium * SEVERITY_SCORES.MEDIUM +
      counts.low * SEVERITY_SCORES.LOW;
    overallScore = Math.min(Math.floor(weighted / Math.max(failed, 1)), 100);

    if (counts.critical > 0) riskLevel = 'CRITICAL';
    else if (counts.high > 0) riskLevel = 'HIGH';
    else if (counts.medium > 0) riskLevel = 'MEDIUM';
  }

  return {
    overallScore,
    criticalCount: counts.critical,
    highCount: counts.high,
    mediumCount: counts.medium,
    lowCount: counts.low,
    passedCount: counts.passed,
    riskLevel,
    summaryText: summaryText(counts),
  };
}
