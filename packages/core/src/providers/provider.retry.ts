export interface RetryOptions {
  maxRetries: number;
  isRetryable: (err: unknown) => boolean;
  /** Overridable for tests. */
  sleep?: (ms: number) => Promise<void>;
}

const NETWORK_ERROR = /ECONNRESET|ENOTFOUND|ETIMEDOUT|ECONNREFUSED|fetch failed/;

/** Return true for transient network errors worth retrying. */
export function isNetworkError(err: unknown): boolean {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? err.cause.message : '';
    return NETWORK_ERROR.test(err.message) || NETWORK_ERROR.test(cause);
  }
  return false;
}

export function backoffDelay(attempt: number): number {
  return Math.min(1000 * Math.pow(2, attempt - 1), 16_000);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Run `fn`, retrying transient failures with exponential backoff. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!options.isRetryable(err) || attempt >= options.maxRetries) {
        throw err;
      }
      attempt++;
      await wait(backoffDelay(attempt));
    }
  }
}
