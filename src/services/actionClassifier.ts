import type { ActionType, Severity } from '../core/types.js';

const ACTION_BY_SEVERITY: Record<Severity, ActionType> = {
  CRITICAL: 'escalate',
  HIGH: 'alert',
  MEDIUM: 'suggest_fix',
  LOW: 'suggest_fix',
};

export function classifyAction(severity: Severity, failedCount: number): ActionType {
  if (failedCount <= 0) return 'none';
  return ACTION_BY_SEVERITY[severity];
}
