/**
 * Retry with exponential backoff
 *
 * The wait after failed attempt n is initialDelayMs * backoffFactor^(n - 1),
 * capped at maxDelayMs. When every attempt fails the last error is wrapped in
 * a RetryExhaustedError that records how many attempts were made.
 */

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
  /** Called after a failed attempt that will be retried */
  onRetry?: (error: unknown, attempt: number, nextDelayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
  onRetry: () => undefined,
};

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      `Gave up after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${
        lastError instanceof Error ? lastError.message : String(lastError)
      }`,
    );
    this.name = 'RetryExhaustedError';
  }
}

export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'backoffFactor'> = {},
): number {
  const { initialDelayMs, maxDelayMs, backoffFactor } = { ...DEFAULT_OPTIONS, ...options };
  return Math.min(initialDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn` until it resolves or `maxAttempts` calls have failed. At least
 * one attempt is always made.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= config.maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }

      const waitMs = backoffDelay(attempt, config);
      config.onRetry(error, attempt, waitMs);
      await sleep(waitMs);
    }
  }
}
