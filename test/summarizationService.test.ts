import type { Finding } from '../src/core/types.js';
import type { SummarizeIssuesInput } from '../src/services/completionClient.js';
import { buildFindingGroup } from '../src/services/groupEnricher.js';
import type { SummaryFields } from '../src/services/responseDecoder.js';
import { SummarizationService } from '../src/services/summarizationService.js';
import { StubAdvisor, makeFinding } from './fixtures.js';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('SummarizationService.summarize', () => {
  it('groups, scores and proposes actions for a mixed scan', async () => {
    const advisor = new StubAdvisor();
    const service = new SummarizationService(advisor);

    const report = await service.summarize({
      scanId: 'scan-1',
      accountId: 'acct-1',
      findings: [
        makeFinding({ resourceId: 'bucket-a', compliance: ['CIS'] }),
        makeFinding({ resourceId: 'bucket-b', compliance: ['CIS', 'PCI'] }),
        makeFinding({ service: 'ec2', checkId: 'sg-check', status: 'PASS', severity: 'LOW', resourceId: 'sg-1' }),
      ],
    });

    expect(report.scanId).toBe('scan-1');
    expect(report.groups).toEqual([
      {
        groupId: 's3:enc-check',
        service: 's3',
        checkId: 'enc-check',
        title: '2 S3 resources failed enc-check',
        description: 'Default encryption is disabled',
        severity: 'HIGH',
        findingCount: 2,
        failedCount: 2,
        resourceIds: ['bucket-a', 'bucket-b'],
        compliance: ['CIS', 'PCI'],
        riskScore: 82,
        recommendedAction: 'alert',
        summary: 'summary for s3',
        remedy: 'remedy for s3',
      },
      {
        groupId: 'ec2:sg-check',
        service: 'ec2',
        checkId: 'sg-check',
        title: 'All 1 EC2 resources passed sg-check',
        description: 'Default encryption is disabled',
        severity: 'LOW',
        findingCount: 1,
        failedCount: 0,
        resourceIds: ['sg-1'],
        compliance: [],
        riskScore: 0,
        recommendedAction: 'none',
        summary: '',
        remedy: '',
      },
    ]);
    expect(report.actionItems).toEqual([
      {
        actionId: 'action_s3:enc-check',
        actionType: 'alert',
        severity: 'HIGH',
        title: 'Fix: 2 S3 resources failed enc-check',
        description: 'Address 2 findings for enc-check',
        groupId: 's3:enc-check',
        commands: ['aws s3 fix'],
      },
    ]);
    expect(report.riskSummary).toMatchObject({
      criticalCount: 0,
      highCount: 2,
      passedCount: 1,
      riskLevel: 'HIGH',
    });
    expect(advisor.summaryCalls).toHaveLength(1);
    expect(advisor.commandCalls[0]).toMatchObject({
      service: 's3',
      region: 'eu-west-1',
      accountId: 'acct-1',
      summary: 'summary for s3',
      remedy: 'remedy for s3',
      resourceIds: ['bucket-a', 'bucket-b'],
    });
  });

  it('returns an empty report for no findings', async () => {
    const report = await new SummarizationService(new StubAdvisor()).summarize({
      scanId: 'empty',
      accountId: 'acct-1',
      findings: [],
    });

    expect(report.groups).toEqual([]);
    expect(report.actionItems).toEqual([]);
    expect(report.riskSummary.riskLevel).toBe('LOW');
    expect(report.riskSummary.summaryText).toBe('All 0 security checks passed.');
  });

  it('skips model calls and action items when remediation is not requested', async () => {
    const advisor = new StubAdvisor();
    const report = await new SummarizationService(advisor).summarize({
      scanId: 'scan-2',
      accountId: 'acct-1',
      findings: [makeFinding()],
      options: { includeRemediation: false },
    });

    expect(advisor.summaryCalls).toHaveLength(0);
    expect(advisor.commandCalls).toHaveLength(0);
    expect(report.actionItems).toEqual([]);
    expect(report.groups[0]).toMatchObject({ riskScore: 75, recommendedAction: 'alert', summary: '', remedy: '' });
  });

  it('defaults the account id and region, and caps summary snippets at 20', async () => {
    const advisor = new StubAdvisor();
    const findings = Array.from({ length: 25 }, (_, i) =>
      makeFinding({ region: '', resourceId: `b${i}`, title: `title ${i}`, description: `desc ${i}` })
    );

    await new SummarizationService(advisor).summarize({ scanId: 'scan-3', accountId: '', findings });

    const call = advisor.summaryCalls[0];
    expect(call.accountId).toBe('unknown');
    expect(call.region).toBe('us-east-1');
    expect(call.snippets).toHaveLength(20);
    expect(call.snippets[0]).toBe('title 0: desc 0');
    expect(advisor.commandCalls[0].resourceIds).toHaveLength(25);
  });

  it('keeps first-seen group order while bounding concurrency at three', async () => {
    let active = 0;
    let peak = 0;
    const completed: string[] = [];
    const advisor = new StubAdvisor();
    advisor.summarizeIssues = async (input: SummarizeIssuesInput): Promise<SummaryFields> => {
      active++;
      peak = Math.max(peak, active);
      // Later groups finish first
      await delay((8 - Number(input.service.slice(3))) * 5);
      active--;
      completed.push(input.service);
      return { summary: '', remedy: '' };
    };

    const findings = Array.from({ length: 7 }, (_, i) => makeFinding({ service: `svc${i}` }));
    const report = await new SummarizationService(advisor).summarize({ scanId: 's', accountId: 'a', findings });

    expect(peak).toBe(3);
    expect(completed).not.toEqual(findings.map(f => f.service));
    expect(report.groups.map(g => g.service)).toEqual(findings.map(f => f.service));
    expect(report.actionItems.map(a => a.groupId)).toEqual(findings.map(f => `${f.service}:enc-check`));
  });

  it('drops a group whose enrichment throws and keeps its siblings', async () => {
    const advisor = new StubAdvisor();
    const original = advisor.summarizeIssues.bind(advisor);
    advisor.summarizeIssues = async (input: SummarizeIssuesInput) => {
      if (input.service === 'iam') throw new Error('unexpected payload');
      return original(input);
    };

    const report = await new SummarizationService(advisor).summarize({
      scanId: 'scan-4',
      accountId: 'acct-1',
      findings: [
        makeFinding({ service: 's3' }),
        makeFinding({ service: 'iam', checkId: 'root-mfa' }),
        makeFinding({ service: 'ec2', checkId: 'sg-check' }),
      ],
    });

    expect(report.groups.map(g => g.groupId)).toEqual(['s3:enc-check', 'ec2:sg-check']);
    expect(report.actionItems.map(a => a.groupId)).toEqual(['s3:enc-check', 'ec2:sg-check']);
    // The scan-wide summary still counts every finding
    expect(report.riskSummary.highCount).toBe(3);
  });

  it('accounts for every finding exactly once across groups', async () => {
    const findings = Array.from({ length: 17 }, (_, i) =>
      makeFinding({
        service: ['s3', 'ec2', 'iam'][i % 3],
        checkId: `c${i % 2}`,
        status: i % 4 === 0 ? 'PASS' : 'FAIL',
        resourceId: `r${i}`,
      })
    );
    const report = await new SummarizationService(new StubAdvisor()).summarize({
      scanId: 'scan-5',
      accountId: 'a',
      findings,
    });

    const total = report.groups.reduce((sum, g) => sum + g.findingCount, 0);
    expect(total).toBe(findings.length);
    expect(report.groups.flatMap(g => g.resourceIds).sort()).toEqual(findings.map(f => f.resourceId).sort());
    for (const group of report.groups) {
      expect(group.riskScore === 0).toBe(group.failedCount === 0);
    }
  });
});

describe('SummarizationService.summarizeStream', () => {
  it('summarizes a drained stream as a synthetic request', async () => {
    async function* stream(): AsyncGenerator<Finding> {
      yield makeFinding({ resourceId: 'b1' });
      yield makeFinding({ service: 'ec2', checkId: 'sg-check', severity: 'CRITICAL', resourceId: 'sg-1' });
    }
    const advisor = new StubAdvisor();

    const report = await new SummarizationService(advisor).summarizeStream(stream());

    expect(report.scanId).toBe('streaming');
    expect(report.groups.map(g => g.groupId)).toEqual(['s3:enc-check', 'ec2:sg-check']);
    expect(report.actionItems.map(a => a.actionType)).toEqual(['alert', 'escalate']);
    expect(advisor.summaryCalls.map(c => c.accountId)).toEqual(['unknown', 'unknown']);
  });
});

describe('buildFindingGroup', () => {
  it('recommends escalation for critical failures', () => {
    const group = buildFindingGroup('rds:public', [
      makeFinding({ service: 'rds', checkId: 'public', severity: 'CRITICAL', description: 'first' }),
      makeFinding({ service: 'rds', checkId: 'public', severity: 'LOW', status: 'PASS', description: 'second' }),
    ]);

    expect(group).toMatchObject({
      title: '1 RDS resources failed public',
      description: 'first',
      severity: 'CRITICAL',
      riskScore: 100,
      recommendedAction: 'escalate',
    });
  });
});
