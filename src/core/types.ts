/**
 * Shared type definitions used across the summarizer
 */

// =============================================================================
// Severity Types
// =============================================================================

/**
 * Severity levels for findings (ordered from most to least severe)
 */
export const SEVERITY_LEVELS = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const;

export type Severity = (typeof SEVERITY_LEVELS)[number];

/**
 * Severity order index (lower = more severe)
 */
export const SEVERITY_ORDER: Record<Severity, number> = {
  CRITICAL: 0,
  HIGH: 1,
  MEDIUM: 2,
  LOW: 3,
} as const;

export function isValidSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && SEVERITY_LEVELS.some(level => level === value);
}

/**
 * Parse a severity string case-insensitively. Returns null for unknown values.
 */
export function parseSeverity(value: unknown): Severity | null {
  if (typeof value !== 'string') return null;
  const upper = value.trim().toUpperCase();
  return isValidSeverity(upper) ? upper : null;
}

/**
 * Compare two severities, returns negative if a is more severe than b
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_ORDER[a] - SEVERITY_ORDER[b];
}

/**
 * Get the more severe of two severity levels
 */
export function maxSeverity(a: Severity, b: Severity): Severity {
  return compareSeverity(a, b) <= 0 ? a : b;
}

// =============================================================================
// Finding Status
// =============================================================================

export const FINDING_STATUSES = ['PASS', 'FAIL'] as const;

export type FindingStatus = (typeof FINDING_STATUSES)[number];

export function parseFindingStatus(value: unknown): FindingStatus | null {
  if (typeof value !== 'string') return null;
  const upper = value.trim().toUpperCase();
  return upper === 'PASS' || upper === 'FAIL' ? upper : null;
}

// =============================================================================
// Findings and report
// =============================================================================

/**
 * One pass/fail check result against one cloud resource
 */
export interface Finding {
  readonly service: string;
  readonly checkId: string;
  readonly region: string;
  readonly resourceId: string;
  readonly status: FindingStatus;
  readonly severity: Severity;
  readonly title: string;
  readonly description: string;
  readonly compliance: readonly string[];
}

export type ActionType = 'none' | 'escalate' | 'alert' | 'suggest_fix';

export interface FindingGroup {
  groupId: string;
  service: string;
  checkId: string;
  title: string;
  description: string;
  severity: Severity;
  findingCount: number;
  failedCount: number;
  resourceIds: string[];
  compliance: string[];
  riskScore: number;
  recommendedAction: ActionType;
  summary: string;
  remedy: string;
}

export interface RiskSummary {
  overallScore: number;
  criticalCount: number;
  highCount: number;
  mediumCount: number;
  lowCount: number;
  passedCount: number;
  riskLevel: Severity;
  summaryText: string;
}

export interface ActionItem {
  actionId: string;
  actionType: ActionType;
  severity: Severity;
  title: string;
  description: string;
  groupId: string;
  commands: string[];
}

export interface SummarizeOptions {
  includeRemediation?: boolean;
}

export interface SummarizeRequest {
  scanId: string;
  accountId: string;
  findings: readonly Finding[];
  options?: SummarizeOptions;
}

export interface SummaryReport {
  scanId: string;
  groups: FindingGroup[];
  riskSummary: RiskSummary;
  actionItems: ActionItem[];
}
