export interface BackoffOptions {
  type: 'exponential' | 'fixed';
  delay: number;
}

export interface RetryOptions {
  /** Total attempts, including the first */
  attempts: number;
  backoff: BackoffOptions;
  /** Decides whether a failed attempt may be repeated */
  retryable: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

/** Thrown once attempts run out; carries how many were made. */
export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(lastError instanceof Error ? lastError.message : String(lastError), { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(backoff: BackoffOptions, attempt: number): number {
  if (backoff.type === 'fixed') return backoff.delay;
  return backoff.delay * 2 ** (attempt - 1);
}

/**
 * Runs `fn` until it succeeds or a non-retryable error occurs.
 * Non-retryable errors are rethrown as-is on the attempt they happen.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryResult<T>> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (err) {
      if (!options.retryable(err)) throw err;
      if (attempt >= options.attempts) throw new RetryExhaustedError(attempt, err);

      const delayMs = backoffDelay(options.backoff, attempt);
      options.onRetry?.(err, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
