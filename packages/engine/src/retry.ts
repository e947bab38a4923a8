export type RetryConfig = {
  /** Total attempts including the first (default: 1, i.e. no retries). */
  attempts?: number;
  /** Fixed wait before every retry (default: 0). */
  delayMs?: number;
};

export type RetryContext = {
  attempt: number;
  attempts: number;
};

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying retryable failures after a fixed delay.
 * `onRetry` fires before each retry with the error that caused it.
 */
export async function withRetries<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  cfg: RetryConfig | undefined,
  isRetryable: (err: unknown) => boolean,
  onRetry?: (err: unknown, next: RetryContext) => void
): Promise<T> {
  const attempts = Math.max(1, cfg?.attempts ?? 1);
  const delayMs = Math.max(0, cfg?.delayMs ?? 0);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn({ attempt, attempts });
    } catch (err) {
      if (attempt >= attempts || !isRetryable(err)) {
        throw err;
      }
      onRetry?.(err, { attempt: attempt + 1, attempts });
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}

/** One retry after a fixed delay: the page and batch policy */
export function singleRetry(delayMs: number): RetryConfig {
  return { attempts: 2, delayMs };
}
