/**
 * Bounded retry with exponential backoff for file reads that can fail
 * while another program (Word, Acrobat, a sync client) holds the file.
 */

import { TransientIoError } from './errors';

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  label?: string;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const TRANSIENT_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'EPERM', 'ETIMEDOUT']);

/**
 * Error codes seen when a file is locked or momentarily unavailable
 */
export function isTransientIoError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  const { code } = error;
  return typeof code === 'string' && TRANSIENT_CODES.has(code);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run fn, retrying transient failures up to maxRetries times.
 * Non-transient errors are rethrown immediately; exhausted retries
 * surface as TransientIoError with the last error as cause.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    baseDelayMs = 100,
    maxDelayMs = 5000,
    label = 'operation',
    isRetryable = isTransientIoError,
    onRetry,
    sleep = defaultSleep,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error)) throw error;
      if (attempt >= maxRetries) {
        throw new TransientIoError(label, attempt + 1, error);
      }

      onRetry?.(error, attempt + 1);
      await sleep(Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs));
    }
  }
}
