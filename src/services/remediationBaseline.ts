/**
 * Deterministic remediation text used when no model is configured or every
 * attempt failed. Performs no I/O.
 */

type CommandTemplate = (resourceIds: readonly string[]) => string[];

const S3_ENCRYPTION_BUCKETS = 3;

const BASELINE_COMMANDS = new Map<string, CommandTemplate>([
  ['s3', (resourceIds) =>
    resourceIds.slice(0, S3_ENCRYPTION_BUCKETS).map(
      (bucket) =>
        `# Enable encryption for bucket ${bucket}\n` +
        `aws s3api put-bucket-encryption --bucket ${bucket} ` +
        `--server-side-encryption-configuration ` +
        `'{"Rules":[{"ApplyServerSideEncryptionByDefault":{"SSEAlgorithm":"AES256"}}]}'`
    )],
  ['ec2', () => [
    '# Review security group rules\n' +
      'aws ec2 describe-security-groups --query ' +
      "'SecurityGroups[?IpPermissions[?IpRanges[?CidrIp==`0.0.0.0/0`]]]'",
  ]],
]);

export function baselineSummary(findingCount: number): string {
  return `Found ${findingCount} security issues that require attention.`;
}

export function baselineRemedy(service: string): string {
  return `Review and remediate ${service.toUpperCase()} security configurations.`;
}

export function baselineCommands(service: string, resourceIds: readonly string[]): string[] {
  const template = BASELINE_COMMANDS.get(service);
  return template ? template(resourceIds) : [];
}
