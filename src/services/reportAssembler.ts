import type { ActionItem, FindingGroup, RiskSummary, SummaryReport } from '../core/types.js';
import type { EnrichedGroup } from './groupEnricher.js';

/**
 * Enrichment result tagged with the group's position in first-seen order
 */
export interface IndexedResult extends EnrichedGroup {
  index: number;
}

export function assembleReport(
  scanId: string,
  results: readonly IndexedResult[],
  riskSummary: RiskSummary
): SummaryReport {
  const ordered = [...results].sort((a, b) => a.index - b.index);

  const groups: FindingGroup[] = [];
  const actionItems: ActionItem[] = [];
  for (const result of ordered) {
    groups.push(result.group);
    if (result.actionItem) actionItems.push(result.actionItem);
  }

  return { scanId, groups, riskSummary, actionItems };
}
