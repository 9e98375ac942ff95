import { RetryPolicy, defaultSleep } from '../src/services/retryPolicy.js';

describe('RetryPolicy', () => {
  const policy = new RetryPolicy({ maxAttempts: 6, baseDelayMs: 2000, maxJitterMs: 1000, random: () => 0.25 });

  it('rotates through models and wraps around', () => {
    const models = ['primary', 'alt-1', 'alt-2'];
    const used = Array.from({ length: 6 }, (_, attempt) => policy.modelFor(attempt, models));
    expect(used).toEqual(['primary', 'alt-1', 'alt-2', 'primary', 'alt-1', 'alt-2']);
  });

  it('doubles the base delay per attempt and adds jitter', () => {
    expect([0, 1, 2, 3].map(attempt => policy.delayFor(attempt))).toEqual([2250, 4250, 8250, 16250]);
  });

  it('keeps jitter below the configured bound', () => {
    const edge = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 100, maxJitterMs: 1000, random: () => 0.999 });
    expect(edge.delayFor(0)).toBeLessThan(1100);
    expect(edge.delayFor(0)).toBeGreaterThanOrEqual(100);
  });

  it('flags the final attempt', () => {
    expect(policy.isLastAttempt(4)).toBe(false);
    expect(policy.isLastAttempt(5)).toBe(true);
  });

  it('rejects an empty rotation and a non-positive attempt budget', () => {
    expect(() => policy.modelFor(0, [])).toThrow('Model rotation is empty');
    expect(() => new RetryPolicy({ maxAttempts: 0, baseDelayMs: 1, maxJitterMs: 0 })).toThrow(
      'maxAttempts must be at least 1, got 0'
    );
  });
});

describe('defaultSleep', () => {
  it('resolves after the delay', async () => {
    await expect(defaultSleep(1)).resolves.toBeUndefined();
  });

  it('rejects with an AbortError when its signal is already aborted', async () => {
    await expect(defaultSleep(60_000, AbortSignal.abort())).rejects.toMatchObject({ name: 'AbortError' });
  });
});
