import type { Finding } from '../src/core/types.js';
import type {
  GenerateCommandsInput,
  RemediationAdvisor,
  SummarizeIssuesInput
} from '../src/services/completionClient.js';
import type { SummaryFields } from '../src/services/responseDecoder.js';

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    service: 's3',
    checkId: 'enc-check',
    region: 'eu-west-1',
    resourceId: 'bucket-1',
    status: 'FAIL',
    severity: 'HIGH',
    title: 'Bucket not encrypted',
    description: 'Default encryption is disabled',
    compliance: [],
    ...overrides,
  };
}

export class StubAdvisor implements RemediationAdvisor {
  readonly summaryCalls: SummarizeIssuesInput[] = [];
  readonly commandCalls: GenerateCommandsInput[] = [];

  async summarizeIssues(input: SummarizeIssuesInput): Promise<SummaryFields> {
    this.summaryCalls.push(input);
    return { summary: `summary for ${input.service}`, remedy: `remedy for ${input.service}` };
  }

  async generateCommands(input: GenerateCommandsInput): Promise<string[]> {
    this.commandCalls.push(input);
    return [`aws ${input.service} fix`];
  }
}
