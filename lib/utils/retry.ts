import { sleep } from "@/lib/utils/abort";

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 500,
  maxDelayMs: 4_000,
  backoffMultiplier: 2,
  shouldRetry: () => true
};

/**
 * Runs `operation` until it resolves, retrying with exponential backoff and
 * jitter. Errors rejected by `shouldRetry` and aborts are rethrown at once.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const finalConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  let lastError: unknown;
  let delayMs = finalConfig.initialDelayMs;

  for (let attempt = 0; attempt <= finalConfig.maxRetries; attempt++) {
    finalConfig.signal?.throwIfAborted();

    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === finalConfig.maxRetries || finalConfig.signal?.aborted || !finalConfig.shouldRetry(error)) {
        throw error;
      }

      const jitter = Math.random() * 0.3 * delayMs;
      const totalDelay = Math.min(delayMs + jitter, finalConfig.maxDelayMs);
      finalConfig.onRetry?.({ attempt: attempt + 1, delayMs: Math.round(totalDelay), error });

      await sleep(totalDelay, finalConfig.signal);
      delayMs = Math.min(delayMs * finalConfig.backoffMultiplier, finalConfig.maxDelayMs);
    }
  }

  throw lastError;
}
