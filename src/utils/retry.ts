export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Runs `fn` up to `attempts` times, doubling the delay after each failure.
 * The last error is rethrown once attempts are exhausted.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < options.attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === options.attempts - 1) break;

      const delay = options.baseDelayMs * Math.pow(2, attempt);
      options.onRetry?.(err, attempt + 1, delay);
      await sleep(delay);
    }
  }

  throw lastError;
}
