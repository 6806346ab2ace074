/**
 * AI API 호출 재시도 / 타임아웃 유틸리티
 * Rate limit (429) 및 일시적 오류에 대한 exponential backoff 처리
 */

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 재시도 직전에 호출 (로그용) */
  onRetry?: ((attempt: number, error: unknown, delayMs: number) => void) | undefined;
  /** 취소되면 더 이상 재시도하지 않고 대기 중인 backoff도 끝냄 */
  signal?: AbortSignal | undefined;
}

const DEFAULT_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

function abortReason(signal: AbortSignal): unknown {
  if (signal.reason !== undefined) return signal.reason;
  const error = new Error('Aborted');
  error.name = 'AbortError';
  return error;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class RequestTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function isRateLimitError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    // OpenAI and Anthropic rate limit patterns
    if (message.includes('429') || message.includes('rate limit') || message.includes('too many requests')) {
      return true;
    }
  }
  // Check for response status in error object
  if (typeof error === 'object' && error !== null) {
    const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
    if (status === 429) {
      return true;
    }
  }
  return false;
}

function isRetryableError(error: unknown): boolean {
  if (error instanceof RequestTimeoutError) return true;
  if (isRateLimitError(error)) return true;
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    // Temporary network/server errors
    if (message.includes('500') || message.includes('502') || message.includes('503') ||
        message.includes('timeout') || message.includes('network') || message.includes('econnreset')) {
      return true;
    }
  }
  return false;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {},
): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs, onRetry, signal } = { ...DEFAULT_CONFIG, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      // Don't retry on abort (타임아웃으로 취소된 호출 포함)
      if (isAbortError(error) || signal?.aborted) {
        throw error;
      }

      // Only retry on retryable errors
      if (!isRetryableError(error) || attempt >= maxRetries) {
        throw error;
      }

      // Exponential backoff with jitter
      const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
      const jitter = Math.random() * baseDelayMs;
      const delay = Math.min(exponentialDelay + jitter, maxDelayMs);

      if (onRetry) {
        onRetry(attempt + 1, error, delay);
      } else {
        console.warn(`[Retry] Attempt ${attempt + 1}/${maxRetries} failed, retrying in ${Math.round(delay)}ms:`,
          error instanceof Error ? error.message : error);
      }

      await sleep(delay, signal);
    }
  }

  throw lastError;
}

/**
 * 호출 1회에 타임아웃을 건다
 * - fn에는 타임아웃/상위 취소를 모두 반영하는 signal이 전달됨
 * - signal을 무시하는 구현이어도 timeoutMs 후에는 RequestTimeoutError로 끝남
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal | undefined,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const onParentAbort = () => controller.abort(parentSignal?.reason);
  if (parentSignal?.aborted) {
    controller.abort(parentSignal.reason);
  } else {
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new RequestTimeoutError(timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}

export { isAbortError, isRateLimitError, isRetryableError };
