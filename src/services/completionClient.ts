import OpenAI from 'openai';
import { summarization, type CompletionConfig } from '../core/env.js';
import { createModuleLogger, errorMessage } from '../core/logger.js';
import { baselineCommands, baselineRemedy, baselineSummary } from './remediationBaseline.js';
import { decodeModelJson, toCommandList, toSummaryFields, type SummaryFields } from './responseDecoder.js';
import { RetryPolicy, defaultSleep, type Sleep } from './retryPolicy.js';

const log = createModuleLogger('completionClient');

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
}

/**
 * One chat exchange with the provider: messages in, raw assistant text out
 */
export type ChatTransport = (request: ChatRequest) => Promise<string>;

export function createOpenAITransport(config: CompletionConfig): ChatTransport {
  // Retries are owned by CompletionClient so the SDK's own are disabled
  const openai = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    maxRetries: 0,
  });

  return async ({ model, messages, temperature, maxTokens }) => {
    const completion = await openai.chat.completions.create({
      model,
      messages,
      temperature,
      max_tokens: maxTokens,
    });
    return completion.choices[0]?.message?.content ?? '{}';
  };
}

export function isRateLimitError(error: unknown): boolean {
  if (error instanceof OpenAI.APIError && error.status === 429) return true;
  return /\b429\b|rate.?limit/i.test(errorMessage(error));
}

export interface SummarizeIssuesInput {
  service: string;
  region: string;
  accountId: string;
  /** "title: description" lines */
  snippets: readonly string[];
}

export interface GenerateCommandsInput {
  service: string;
  region: string;
  accountId: string;
  summary: string;
  remedy: string;
  resourceIds: readonly string[];
}

/**
 * Free-text remediation for a failing group
 */
export interface RemediationAdvisor {
  summarizeIssues(input: SummarizeIssuesInput): Promise<SummaryFields>;
  generateCommands(input: GenerateCommandsInput): Promise<string[]>;
}

export interface CompletionClientDeps {
  transport?: ChatTransport;
  sleep?: Sleep;
  random?: () => number;
}

/**
 * Text-generation client with model rotation, exponential backoff and
 * deterministic fallbacks. Without an API key it never calls out.
 */
export class CompletionClient implements RemediationAdvisor {
  private readonly models: readonly string[];
  private readonly transport: ChatTransport | null;
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(config: CompletionConfig, deps: CompletionClientDeps = {}) {
    this.models = config.models;
    this.policy = new RetryPolicy({
      maxAttempts: config.maxAttempts,
      baseDelayMs: config.baseDelayMs,
      maxJitterMs: config.maxJitterMs,
      random: deps.random,
    });
    this.sleep = deps.sleep ?? defaultSleep;

    if (!config.apiKey) {
      log.warn('OPENAI_API_KEY not set, LLM features will be disabled');
      this.transport = null;
    } else {
      this.transport = deps.transport ?? createOpenAITransport(config);
      log.info({ models: this.models, baseUrl: config.baseUrl }, 'LLM client initialized');
    }
  }

  get available(): boolean {
    return this.transport !== null;
  }

  /**
   * Run one request through the attempt schedule. Rejects with the last
   * attempt's error once every attempt has failed.
   */
  async complete(request: Omit<ChatRequest, 'model'>, label = 'completion'): Promise<string> {
    if (!this.transport) {
      throw new Error('Completion client is not configured');
    }

    let lastError: unknown = new Error(`[${label}] No attempts made`);
    for (let attempt = 0; attempt < this.policy.maxAttempts; attempt++) {
      const model = this.policy.modelFor(attempt, this.models);
      try {
        const text = await this.transport({ ...request, model });
        if (attempt > 0) {
          log.info({ label, model, attempt: attempt + 1 }, 'Completion succeeded after retry');
        }
        return text;
      } catch (error) {
        lastError = error;
        if (this.policy.isLastAttempt(attempt)) break;

        const delayMs = Math.round(this.policy.delayFor(attempt));
        const meta = {
          label,
          model,
          attempt: attempt + 1,
          maxAttempts: this.policy.maxAttempts,
          delayMs,
          error: errorMessage(error),
        };
        if (isRateLimitError(error)) {
          log.warn(meta, 'Rate limited by provider, backing off');
        } else {
          log.warn(meta, 'Completion attempt failed, retrying');
        }
        await this.sleep(delayMs);
      }
    }

    log.error({ label, attempts: this.policy.maxAttempts, error: errorMessage(lastError) }, 'Completion attempts exhausted');
    throw lastError;
  }

  async summarizeIssues(input: SummarizeIssuesInput): Promise<SummaryFields> {
    const fallback = (): SummaryFields => ({
      summary: baselineSummary(input.snippets.length),
      remedy: baselineRemedy(input.service),
    });
    if (!this.transport) return fallback();

    const findingsText = input.snippets.slice(0, summarization.MAX_PROMPT_SNIPPETS).join('\n');
    const messages: ChatMessage[] = [
      {
        role: 'system',
        content:
          `You are a cloud security expert analyzing AWS findings. ` +
          `You will analyze findings from service ${input.service} in region ${input.region} ` +
          `for AWS account ${input.accountId}. Provide concise, actionable security analysis.`,
      },
      {
        role: 'user',
        content: `Analyze these security findings and provide:
1. A brief summary of the problems found (2-3 sentences)
2. A general description of remediation steps (2-3 sentences)

Findings:
${findingsText}

Respond in JSON format:
{"summary": "...", "remedy": "..."}`,
      },
    ];

    try {
      const text = await this.complete(
        { messages, temperature: 0.3, maxTokens: 500 },
        `summarize:${input.service}`
      );
      const decoded = decodeModelJson(text);
      if (!decoded.ok) {
        log.warn({ service: input.service, response: text.slice(0, 200) }, 'Failed to parse LLM response as JSON');
      }
      return toSummaryFields(decoded);
    } catch (error) {
      log.error({ service: input.service, error: errorMessage(error) }, 'LLM summarization failed, using baseline text');
      return fallback();
    }
  }

  async generateCommands(input: GenerateCommandsInput): Promise<string[]> {
    if (!this.transport) return baselineCommands(input.service, input.resourceIds);

    const affected = input.resourceIds.slice(0, summarization.MAX_PROMPT_RESOURCES).join(', ');
    const messages: ChatMessage[] = [
      {
        role: 'system',
        content:
          `You are an AWS automation expert. ` +
          `Generate AWS CLI commands to remediate security issues in ${input.service} ` +
          `for account ${input.accountId} in region ${input.region}. ` +
          `Only provide valid, executable AWS CLI commands.`,
      },
      {
        role: 'user',
        content: `Generate AWS CLI commands for remediation:

Summary: ${input.summary}

Remedy: ${input.remedy}

Affected resources: ${affected}

Respond with a JSON array of AWS CLI commands:
{"commands": ["aws ...", "aws ..."]}

Important:
- Use the correct region: ${input.region}
- Commands should be safe and follow best practices
- Include comments as separate strings if needed`,
      },
    ];

    try {
      const text = await this.complete(
        { messages, temperature: 0.2, maxTokens: 1_000 },
        `commands:${input.service}`
      );
      const decoded = decodeModelJson(text);
      if (!decoded.ok) {
        log.warn({ service: input.service, response: text.slice(0, 200) }, 'Failed to parse commands JSON');
      }
      return toCommandList(decoded);
    } catch (error) {
      log.error({ service: input.service, error: errorMessage(error) }, 'LLM command generation failed, using baseline commands');
      return baselineCommands(input.service, input.resourceIds);
    }
  }
}
