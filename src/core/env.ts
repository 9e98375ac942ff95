/**
 * Centralized environment configuration for the summarizer service
 *
 * All environment variables should be accessed through this module so that
 * parsing, defaults and documentation live in one place.
 */

export type EnvSource = Record<string, string | undefined>;

// =============================================================================
// Helper Functions
// =============================================================================

function parseIntEnv(source: EnvSource, key: string, defaultValue: number): number {
  const value = source[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseStringEnv(source: EnvSource, key: string, defaultValue: string): string {
  const value = source[key];
  return value && value.trim() ? value.trim() : defaultValue;
}

/**
 * Parse a comma-separated environment variable into an array of strings
 * @param fallback - Default values if not set
 * @returns Array of trimmed, non-empty strings
 */
export function parseCsvEnv(source: EnvSource, key: string, fallback: string[]): string[] {
  const raw = source[key];
  if (!raw) return fallback;
  return raw.split(',').map(s => s.trim()).filter(Boolean);
}

// =============================================================================
// Runtime Environment
// =============================================================================

export const env = {
  /** Current environment: 'production' | 'development' | 'test' */
  NODE_ENV: parseStringEnv(process.env, 'NODE_ENV', 'development'),
  isProduction: process.env.NODE_ENV === 'production',
  isTest: process.env.NODE_ENV === 'test',
  /** Log level: 'debug' | 'info' | 'warn' | 'error' | 'silent' */
  LOG_LEVEL: process.env.LOG_LEVEL?.toLowerCase(),
} as const;

// =============================================================================
// LLM Configuration
// =============================================================================

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_MODEL = 'z-ai/glm-4.5-air:free';

/**
 * Alternates tried after the primary model, in order
 */
export const FALLBACK_MODELS = [
  'meta-llama/llama-3.3-70b-instruct:free',
  'mistralai/mistral-small-3.1-24b-instruct:free',
] as const;

export const MAX_COMPLETION_ATTEMPTS = 6;
export const RETRY_BASE_DELAY_MS = 2_000;
export const RETRY_MAX_JITTER_MS = 1_000;

export interface CompletionConfig {
  /** Empty when no credential is configured; the client then stays in fallback mode */
  apiKey: string;
  baseUrl: string;
  /** Primary model first */
  models: string[];
  maxAttempts: number;
  baseDelayMs: number;
  maxJitterMs: number;
  timeoutMs: number;
}

/**
 * Primary model followed by each built-in alternate that differs from it
 */
export function buildModelRotation(primary: string, alternates: readonly string[] = FALLBACK_MODELS): string[] {
  const models = [primary];
  for (const model of alternates) {
    if (!models.includes(model)) models.push(model);
  }
  return models;
}

export function loadCompletionConfig(source: EnvSource = process.env): CompletionConfig {
  return {
    apiKey: source.OPENAI_API_KEY?.trim() ?? '',
    baseUrl: parseStringEnv(source, 'OPENAI_BASE_URL', DEFAULT_BASE_URL),
    models: buildModelRotation(parseStringEnv(source, 'OPENAI_MODEL', DEFAULT_MODEL)),
    maxAttempts: MAX_COMPLETION_ATTEMPTS,
    baseDelayMs: RETRY_BASE_DELAY_MS,
    maxJitterMs: RETRY_MAX_JITTER_MS,
    timeoutMs: parseIntEnv(source, 'LLM_TIMEOUT_MS', 60_000),
  };
}

// =============================================================================
// Summarization
// =============================================================================

export const summarization = {
  /** Concurrent group enrichments, bounded by the provider's rate limits */
  WORKER_CONCURRENCY: 3,
  /** Failing findings handed to the summary prompt per group */
  MAX_GROUP_SNIPPETS: 20,
  /** Snippets embedded in one summary prompt */
  MAX_PROMPT_SNIPPETS: 50,
  /** Resource ids embedded in one command prompt */
  MAX_PROMPT_RESOURCES: 10,
  DEFAULT_REGION: 'us-east-1',
  DEFAULT_ACCOUNT_ID: 'unknown',
  STREAMING_SCAN_ID: 'streaming',
} as const;

// =============================================================================
// HTTP Server
// =============================================================================

export interface ServerConfig {
  port: number;
  host: string;
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  jsonBodyLimit: string;
  /** Findings accepted on one NDJSON stream */
  maxStreamFindings: number;
  allowedOrigins: string[];
}

export function loadServerConfig(source: EnvSource = process.env): ServerConfig {
  return {
    port: parseIntEnv(source, 'PORT', 8080),
    host: parseStringEnv(source, 'HOST', '127.0.0.1'),
    rateLimitWindowMs: parseIntEnv(source, 'RATE_LIMIT_WINDOW_MS', 60_000),
    rateLimitMaxRequests: parseIntEnv(source, 'RATE_LIMIT_MAX_REQUESTS', 30),
    jsonBodyLimit: parseStringEnv(source, 'JSON_BODY_LIMIT', '20mb'),
    maxStreamFindings: parseIntEnv(source, 'STREAM_MAX_FINDINGS', 10_000),
    allowedOrigins: parseCsvEnv(source, 'ALLOWED_ORIGINS', []),
  };
}
