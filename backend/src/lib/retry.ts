import { TimeoutError } from './errors';
import { logger } from './logger';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  /** Ошибки, которые не имеет смысла повторять, пробрасываются сразу */
  retryIf?: (error: unknown) => boolean;
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Bounded retry with exponential backoff: baseDelay, 2×baseDelay, 4×baseDelay…
 * Rethrows the last error once attempts are exhausted.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const sleep = options.sleep ?? delay;
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      lastError = e;
      if (options.retryIf && !options.retryIf(e)) throw e;
      if (attempt === attempts) break;
      const wait = options.baseDelayMs * 2 ** (attempt - 1);
      logger.debug('Retry', `${options.label ?? 'operation'} failed, attempt ${attempt}/${attempts}`, {
        error: e,
        waitMs: wait
      });
      await sleep(wait);
    }
  }
  throw lastError;
}

/** Reject with TimeoutError when the promise does not settle in time. */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return promise;
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
