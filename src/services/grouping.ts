import type { Finding } from '../core/types.js';

export function groupKey(finding: Pick<Finding, 'service' | 'checkId'>): string {
  return `${finding.service}:${finding.checkId}`;
}

/**
 * Partition findings by `service:checkId`. Map iteration follows the order in
 * which each key was first seen; members keep input order.
 */
export function groupFindings(findings: Iterable<Finding>): Map<string, Finding[]> {
  const grouped = new Map<string, Finding[]>();
  for (const finding of findings) {
    const key = groupKey(finding);
    const members = grouped.get(key);
    if (members) {
      members.push(finding);
    } else {
      grouped.set(key, [finding]);
    }
  }
  return grouped;
}

/**
 * Inverse of groupKey. Splits on the first colon so check ids may contain colons.
 */
export function splitGroupKey(key: string): { service: string; checkId: string } {
  const idx = key.indexOf(':');
  if (idx === -1) return { service: key, checkId: '' };
  return { service: key.slice(0, idx), checkId: key.slice(idx + 1) };
}
