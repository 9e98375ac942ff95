import { summarization } from '../core/env.js';
import { createModuleLogger } from '../core/logger.js';
import type { Finding, SummarizeRequest, SummaryReport } from '../core/types.js';
import type { RemediationAdvisor } from './completionClient.js';
import { groupFindings } from './grouping.js';
import { assembleReport } from './reportAssembler.js';
import { calculateRiskSummary } from './riskScoring.js';
import { enrichGroups } from './summarizationOrchestrator.js';

const log = createModuleLogger('summarizationService');

export interface SummarizationServiceOptions {
  concurrency?: number;
}

export class SummarizationService {
  private readonly advisor: RemediationAdvisor;
  private readonly concurrency: number;

  constructor(advisor: RemediationAdvisor, options: SummarizationServiceOptions = {}) {
    this.advisor = advisor;
    this.concurrency = options.concurrency ?? summarization.WORKER_CONCURRENCY;
  }

  async summarize(request: SummarizeRequest): Promise<SummaryReport> {
    const accountId = request.accountId || summarization.DEFAULT_ACCOUNT_ID;
    const includeRemediation = request.options?.includeRemediation ?? true;

    log.info({ scanId: request.scanId, accountId, findings: request.findings.length }, 'Summarizing findings');

    const grouped = groupFindings(request.findings);
    const results = await enrichGroups(
      grouped,
      { accountId, includeRemediation, advisor: this.advisor },
      this.concurrency
    );

    return assembleReport(request.scanId, results, calculateRiskSummary(request.findings));
  }

  /**
   * Drain a finding stream, then summarize it as one synthetic request
   */
  async summarizeStream(findings: AsyncIterable<Finding>): Promise<SummaryReport> {
    const collected: Finding[] = [];
    for await (const finding of findings) {
      collected.push(finding);
    }
    return this.summarize({
      scanId: summarization.STREAMING_SCAN_ID,
      accountId: summarization.DEFAULT_ACCOUNT_ID,
      findings: collected,
    });
  }
}
