import {
  GenerationUnavailable,
  RenderError,
  RetriesExhausted,
  RetryPolicy,
  computeBackoff,
  withRetry,
} from '../src';

const policy: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 1000,
  backoffMultiplier: 2,
  jitter: 0,
};

describe('computeBackoff', () => {
  it('grows exponentially per attempt', () => {
    expect(computeBackoff(1, policy)).toBe(100);
    expect(computeBackoff(2, policy)).toBe(200);
    expect(computeBackoff(3, policy)).toBe(400);
  });

  it('caps at the maximum delay', () => {
    expect(computeBackoff(10, policy)).toBe(1000);
  });

  it('spreads jitter around the exponential delay', () => {
    const jittered = { ...policy, jitter: 0.5 };
    expect(computeBackoff(3, jittered, () => 0)).toBe(200);
    expect(computeBackoff(3, jittered, () => 1)).toBe(600);
  });
});

describe('withRetry', () => {
  it('retries transient failures and returns the eventual result', async () => {
    const delays: number[] = [];
    const fn = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new GenerationUnavailable('busy'))
      .mockRejectedValueOnce(new GenerationUnavailable('still busy'))
      .mockResolvedValueOnce('ok');

    const result = await withRetry(fn, policy, {
      operation: 'generate',
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
  });

  it('raises RetriesExhausted carrying the last cause', async () => {
    const fn = jest.fn(async () => {
      throw new GenerationUnavailable('model offline');
    });

    const error = await withRetry(fn, policy, { operation: 'generate', sleep: async () => undefined }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(RetriesExhausted);
    if (!(error instanceof RetriesExhausted)) return;
    expect(error.attempts).toBe(3);
    expect(error.cause).toBeInstanceOf(GenerationUnavailable);
    expect(error.message).toBe('generate failed after 3 attempts: model offline');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry non-retryable errors', async () => {
    const fn = jest.fn(async () => {
      throw new RenderError('bad content');
    });

    await expect(withRetry(fn, policy, { operation: 'render', sleep: async () => undefined })).rejects.toBeInstanceOf(
      RenderError
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('honours a custom retry predicate', async () => {
    const fn = jest
      .fn<Promise<number>, [number]>()
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce(7);

    const result = await withRetry(fn, policy, {
      operation: 'poll',
      shouldRetry: (e) => e instanceof Error && e.message === 'ECONNRESET',
      sleep: async () => undefined,
    });

    expect(result).toBe(7);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
  });
});
