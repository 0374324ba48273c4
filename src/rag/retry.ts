export interface RetryOptions {
  /** Total attempts, including the first. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
  /** Errors for which this returns false are rethrown at once. */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 15_000,
  factor: 2,
};

/**
 * Runs `operation` until it succeeds or `maxAttempts` is reached, backing off
 * exponentially with ±10% jitter. The last error is rethrown.
 */
export async function retry<T>(
  operation: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const config: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let delay = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt >= config.maxAttempts) throw error;
      if (config.shouldRetry && !config.shouldRetry(error)) throw error;

      config.onRetry?.(error, attempt);
      const jitter = delay * 0.2 * (Math.random() - 0.5);
      await new Promise((resolve) => setTimeout(resolve, Math.max(0, delay + jitter)));
      delay = Math.min(delay * config.factor, config.maxDelayMs);
    }
  }
}
