/**
 * Request parsing for the summarize endpoints
 * Narrows untrusted JSON into typed findings and requests
 */
import { Errors, RequestValidationError } from './errors.js';
import {
  FINDING_STATUSES,
  SEVERITY_LEVELS,
  parseFindingStatus,
  parseSeverity,
  type Finding,
  type SummarizeOptions,
  type SummarizeRequest
} from './types.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(obj: JsonObject, key: string, field: string): string {
  const value = obj[key];
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') {
    throw new RequestValidationError(Errors.invalidFormat(field, 'Expected a string'));
  }
  return value;
}

function requiredString(obj: JsonObject, key: string, field: string): string {
  const value = obj[key];
  if (value === undefined || value === null || value === '') {
    throw new RequestValidationError(Errors.missingField(field));
  }
  if (typeof value !== 'string') {
    throw new RequestValidationError(Errors.invalidFormat(field, 'Expected a string'));
  }
  return value;
}

function stringList(obj: JsonObject, key: string, field: string): string[] {
  const value = obj[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new RequestValidationError(Errors.invalidFormat(field, 'Expected an array of strings'));
  }
  return value;
}

/**
 * Parse one finding. `field` names its position in the request for error details.
 */
export function parseFinding(value: unknown, field = 'finding'): Finding {
  if (!isObject(value)) {
    throw new RequestValidationError(Errors.invalidFormat(field, 'Expected an object'));
  }

  const status = parseFindingStatus(value.status);
  if (!status) {
    throw new RequestValidationError(Errors.invalidOption(`${field}.status`, FINDING_STATUSES));
  }
  const severity = parseSeverity(value.severity);
  if (!severity) {
    throw new RequestValidationError(Errors.invalidOption(`${field}.severity`, SEVERITY_LEVELS));
  }

  return {
    service: requiredString(value, 'service', `${field}.service`),
    checkId: optionalString(value, 'checkId', `${field}.checkId`),
    region: optionalString(value, 'region', `${field}.region`),
    resourceId: optionalString(value, 'resourceId', `${field}.resourceId`),
    status,
    severity,
    title: optionalString(value, 'title', `${field}.title`),
    description: optionalString(value, 'description', `${field}.description`),
    compliance: stringList(value, 'compliance', `${field}.compliance`),
  };
}

function parseOptions(value: unknown): SummarizeOptions | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isObject(value)) {
    throw new RequestValidationError(Errors.invalidFormat('options', 'Expected an object'));
  }
  const include = value.includeRemediation;
  if (include === undefined || include === null) return {};
  if (typeof include !== 'boolean') {
    throw new RequestValidationError(Errors.invalidFormat('options.includeRemediation', 'Expected a boolean'));
  }
  return { includeRemediation: include };
}

export function parseSummarizeRequest(body: unknown): SummarizeRequest {
  if (!isObject(body)) {
    throw new RequestValidationError(Errors.invalidFormat('body', 'Expected a JSON object'));
  }
  const rawFindings = body.findings ?? [];
  if (!Array.isArray(rawFindings)) {
    throw new RequestValidationError(Errors.invalidFormat('findings', 'Expected an array'));
  }

  return {
    scanId: requiredString(body, 'scanId', 'scanId'),
    accountId: optionalString(body, 'accountId', 'accountId'),
    findings: rawFindings.map((finding, index) => parseFinding(finding, `findings[${index}]`)),
    options: parseOptions(body.options),
  };
}
