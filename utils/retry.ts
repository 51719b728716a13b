import { DocQAError, TimeoutError, errorMessage } from './errors';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of each delay that is randomized, 0 disables jitter. */
  jitter: number;
}

export interface RetryOptions {
  label: string;
  timeoutMs?: number;
  isRetryable?: (error: unknown) => boolean;
  random?: () => number;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Exponential backoff for the given (1-based) failed attempt, capped at `maxDelayMs`.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
  const spread = exponential * policy.jitter;
  return Math.max(0, Math.round(exponential - spread + random() * 2 * spread));
}

/**
 * Timeouts, network errors, 408/429 and 5xx responses are worth another attempt.
 * Typed domain errors and other 4xx responses are not.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;
  if (error instanceof DocQAError) return false;

  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    const status = error.status;
    return status === 408 || status === 429 || status >= 500;
  }

  return true;
}

export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs `task` under `policy`. Every attempt gets its own timeout and abort signal.
 * Rethrows the last error once attempts are exhausted or the error is not retryable.
 */
export async function withRetry<T>(
  task: (signal?: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransientError;
  const attempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
        return await withTimeout(task, options.timeoutMs, options.label);
      }
      return await task();
    } catch (error) {
      lastError = error;
      if (attempt >= attempts || !isRetryable(error)) {
        break;
      }

      const delay = backoffDelay(policy, attempt, options.random);
      console.warn(`[Retry] ${options.label} failed (attempt ${attempt}/${attempts}), retrying in ${delay}ms:`, errorMessage(error));
      await sleep(delay);
    }
  }

  throw lastError;
}
