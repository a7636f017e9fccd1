import { RetryExhaustedError, backoffDelay, withRetry } from '../retryUtils';

describe('backoffDelay', () => {
  it('grows by the backoff factor up to the cap', () => {
    const options = { initialDelayMs: 500, maxDelayMs: 8000, backoffFactor: 2 };

    expect([1, 2, 3, 4, 5, 6].map((attempt) => backoffDelay(attempt, options))).toEqual([
      500, 1000, 2000, 4000, 8000, 8000,
    ]);
  });
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = jest.fn(async () => 'ok');

    await expect(withRetry(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('recovers when a later attempt succeeds', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { initialDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('wraps the last error once maxAttempts calls have failed', async () => {
    let calls = 0;
    const fn = jest.fn(async (): Promise<string> => {
      calls += 1;
      throw new Error(`failure ${calls}`);
    });

    const error = await withRetry(fn, { maxAttempts: 3, initialDelayMs: 0 }).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.message).toBe('Gave up after 3 attempts: failure 3');
      expect(error.attempts).toBe(3);
      expect(error.lastError).toEqual(new Error('failure 3'));
    }
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('makes one attempt when maxAttempts is below one', async () => {
    const fn = jest.fn(async (): Promise<void> => {
      throw new Error('down');
    });

    await expect(withRetry(fn, { maxAttempts: 0 })).rejects.toThrow('Gave up after 1 attempt: down');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('reports each scheduled delay before waiting', async () => {
    jest.useFakeTimers();
    try {
      const delays: number[] = [];
      const fn = jest.fn(async (): Promise<void> => {
        throw new Error('busy');
      });

      const result = withRetry(fn, {
        maxAttempts: 5,
        initialDelayMs: 500,
        maxDelayMs: 1500,
        onRetry: (_error, _attempt, nextDelayMs) => delays.push(nextDelayMs),
      });
      const assertion = expect(result).rejects.toThrow('Gave up after 5 attempts: busy');

      await jest.runAllTimersAsync();
      await assertion;

      expect(delays).toEqual([500, 1000, 1500, 1500]);
      expect(fn).toHaveBeenCalledTimes(5);
    } finally {
      jest.useRealTimers();
    }
  });
});
