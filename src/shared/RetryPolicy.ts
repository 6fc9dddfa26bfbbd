function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  /** 單次等待上限（含伺服器要求的 retry-after） */
  maxDelayMs?: number;
  isRetryable: (err: unknown) => boolean;
  /** 錯誤本身指定的等待時間（例如 429 的 retry-after），優先於指數退避 */
  delayHint?: (err: unknown) => number | undefined;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
}

/**
 * 帶指數退避和 jitter 的重試策略
 * 總嘗試次數 = 1（初始） + maxRetries
 */
export async function withRetry<T>(
  operation: () => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await operation();
    } catch (err) {
      lastError = err;
      if (attempt < opts.maxRetries && opts.isRetryable(err)) {
        const backoff = opts.baseDelayMs * Math.pow(2, attempt) + Math.random() * opts.baseDelayMs;
        const hinted = opts.delayHint?.(err);
        const delay = Math.min(hinted ?? backoff, opts.maxDelayMs ?? Number.POSITIVE_INFINITY);
        opts.onRetry?.(attempt + 1, err, delay);
        await sleep(delay);
      } else {
        throw err;
      }
    }
  }

  throw lastError;
}
