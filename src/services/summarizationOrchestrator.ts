import pLimit from 'p-limit';
import { summarization } from '../core/env.js';
import { createModuleLogger, errorMessage } from '../core/logger.js';
import type { Finding } from '../core/types.js';
import { enrichGroup, type EnrichmentContext } from './groupEnricher.js';
import type { IndexedResult } from './reportAssembler.js';

const log = createModuleLogger('summarizationOrchestrator');

/**
 * Enrich every group on a bounded worker pool. A group whose enrichment throws
 * is logged and left out; the others still complete. Results carry their
 * group index, arriving in completion order.
 */
export async function enrichGroups(
  grouped: ReadonlyMap<string, readonly Finding[]>,
  ctx: EnrichmentContext,
  concurrency: number = summarization.WORKER_CONCURRENCY
): Promise<IndexedResult[]> {
  const limit = pLimit(concurrency);
  const total = grouped.size;
  const results: IndexedResult[] = [];

  log.info({ groups: total, concurrency }, 'Processing finding groups');

  const tasks = [...grouped.entries()].map(([key, findings], index) =>
    limit(async () => {
      log.debug({ group: key, position: index + 1, total }, 'Processing group');
      try {
        const enriched = await enrichGroup(key, findings, ctx);
        results.push({ index, ...enriched });
      } catch (error) {
        log.error({ group: key, error: errorMessage(error) }, 'Group enrichment failed, omitting group');
      }
    })
  );

  await Promise.all(tasks);
  log.info({ completed: results.length, dropped: total - results.length }, 'Finished processing all groups');
  return results;
}
