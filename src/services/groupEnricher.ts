import { summarization } from '../core/env.js';
import type { ActionItem, Finding, FindingGroup } from '../core/types.js';
import { classifyAction } from './actionClassifier.js';
import type { RemediationAdvisor } from './completionClient.js';
import { splitGroupKey } from './grouping.js';
import { countFailed, highestSeverity, scoreGroup } from './riskScoring.js';

export interface EnrichmentContext {
  accountId: string;
  includeRemediation: boolean;
  advisor: RemediationAdvisor;
}

export interface EnrichedGroup {
  group: FindingGroup;
  actionItem?: ActionItem;
}

function groupTitle(service: string, checkId: string, total: number, failed: number): string {
  const label = service.toUpperCase();
  return failed > 0
    ? `${failed} ${label} resources failed ${checkId}`
    : `All ${total} ${label} resources passed ${checkId}`;
}

function unionCompliance(findings: readonly Finding[]): string[] {
  const tags = new Set<string>();
  for (const f of findings) {
    for (const tag of f.compliance) tags.add(tag);
  }
  return [...tags];
}

/**
 * Scored and classified group without any model output. `findings` must be non-empty.
 */
export function buildFindingGroup(key: string, findings: readonly Finding[]): FindingGroup {
  const { service, checkId } = splitGroupKey(key);
  const failedCount = countFailed(findings);
  const severity = highestSeverity(findings);

  return {
    groupId: key,
    service,
    checkId,
    title: groupTitle(service, checkId, findings.length, failedCount),
    description: findings[0]?.description ?? '',
    severity,
    findingCount: findings.length,
    failedCount,
    resourceIds: findings.map(f => f.resourceId),
    compliance: unionCompliance(findings),
    riskScore: scoreGroup(findings, severity),
    recommendedAction: classifyAction(severity, failedCount),
    summary: '',
    remedy: '',
  };
}

export function buildActionItem(group: FindingGroup, commands: string[]): ActionItem {
  return {
    actionId: `action_${group.groupId}`,
    actionType: group.recommendedAction,
    severity: group.severity,
    title: `Fix: ${group.title}`,
    description: `Address ${group.findingCount} findings for ${group.checkId}`,
    groupId: group.groupId,
    commands,
  };
}

function regionOf(finding: Finding | undefined): string {
  return finding?.region || summarization.DEFAULT_REGION;
}

/**
 * Group plus, for failing groups with remediation requested, model summary,
 * remedy and an action item with candidate commands.
 */
export async function enrichGroup(
  key: string,
  findings: readonly Finding[],
  ctx: EnrichmentContext
): Promise<EnrichedGroup> {
  const group = buildFindingGroup(key, findings);
  if (group.failedCount === 0 || !ctx.includeRemediation) {
    return { group };
  }

  const failed = findings.filter(f => f.status === 'FAIL');
  const snippets = failed
    .slice(0, summarization.MAX_GROUP_SNIPPETS)
    .map(f => `${f.title}: ${f.description}`);

  const { summary, remedy } = await ctx.advisor.summarizeIssues({
    service: group.service,
    region: regionOf(findings[0]),
    accountId: ctx.accountId,
    snippets,
  });
  const enriched: FindingGroup = { ...group, summary, remedy };

  const commands = await ctx.advisor.generateCommands({
    service: enriched.service,
    region: regionOf(failed[0]),
    accountId: ctx.accountId,
    summary,
    remedy,
    resourceIds: enriched.resourceIds,
  });

  return { group: enriched, actionItem: buildActionItem(enriched, commands) };
}
