import { RetryCountExceededError } from '../domain/errors/DomainErrors.js';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
}

/**
 * 帶指數退避和 jitter 的重試策略
 * 總嘗試次數 = 1（初始） + maxRetries
 * 可重試錯誤用盡次數時丟出 RetryCountExceededError（cause 為最後一次錯誤）
 */
export async function withRetry<T>(
  operation: () => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!opts.isRetryable(err)) throw err;
      if (attempt >= opts.maxRetries) {
        throw new RetryCountExceededError(attempt + 1, { cause: err });
      }
      const delay = opts.baseDelayMs * Math.pow(2, attempt) + Math.random() * opts.baseDelayMs;
      opts.onRetry?.(attempt + 1, err);
      await sleep(delay);
    }
  }
}
