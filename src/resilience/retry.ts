import { isTransient } from '../lib/errors';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Absolute epoch ms; no new attempt starts if its backoff would end past it. */
  deadline?: number;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export async function pause(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/** Exponential backoff with equal jitter: half the window fixed, half random. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, random = Math.random): number {
  const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  return Math.round(ceiling / 2 + random() * (ceiling / 2));
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    attempts,
    baseDelayMs,
    maxDelayMs,
    deadline,
    shouldRetry = isTransient,
    onRetry,
    now = Date.now,
    sleep = pause,
    random = Math.random
  } = options;

  let lastErr: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastErr = err;
      if (attempt === attempts || !shouldRetry(err)) break;
      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs, random);
      if (deadline !== undefined && now() + delay >= deadline) break;
      onRetry?.(err, attempt, delay);
      await sleep(delay);
    }
  }
  throw lastErr instanceof Error ? lastErr : new Error('withRetry failed');
}
