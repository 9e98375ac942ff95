import { setTimeout as sleepFor } from 'node:timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxJitterMs: number;
  /** Uniform in [0, 1) */
  random?: () => number;
}

/**
 * Stateless attempt schedule: which model serves attempt `i` and how long to
 * wait after it fails. Models rotate, so attempts wrap around the list.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxJitterMs: number;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions) {
    if (options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be at least 1, got ${options.maxAttempts}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = options.baseDelayMs;
    this.maxJitterMs = options.maxJitterMs;
    this.random = options.random ?? Math.random;
  }

  modelFor(attempt: number, models: readonly string[]): string {
    if (models.length === 0) {
      throw new Error('Model rotation is empty');
    }
    return models[attempt % models.length];
  }

  delayFor(attempt: number): number {
    return this.baseDelayMs * 2 ** attempt + this.random() * this.maxJitterMs;
  }

  isLastAttempt(attempt: number): boolean {
    return attempt >= this.maxAttempts - 1;
  }
}
