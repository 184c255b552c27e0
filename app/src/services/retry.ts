/**
 * Retry helpers — bounded exponential backoff for transient adapter failures.
 *
 * Only TransientInfraError (timeouts, version conflicts, adapter I/O) is
 * retried. Validation, configuration and transition errors surface at once.
 */
import { AdapterTimeoutError, isTransient } from './governance-errors.js';

/** Maximum backoff cap in milliseconds. */
const MAX_BACKOFF_MS = 30_000;

/** Maximum jitter added to backoff in milliseconds. */
const MAX_JITTER_MS = 100;

export interface RetryOptions {
  /** Total attempts including the first. */
  readonly attempts: number;
  readonly baseDelayMs: number;
  /** Injectable sleep for tests. Defaults to real setTimeout. */
  readonly sleep?: (ms: number) => Promise<void>;
  /** Injectable jitter source in [0, 1). */
  readonly random?: () => number;
  /** Called before each retry with the failed attempt number (0-based). */
  readonly onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  readonly signal?: AbortSignal;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Compute retry delay with exponential backoff + jitter.
 *
 * Formula: min(baseDelay * 2^attempt + random * MAX_JITTER_MS, MAX_BACKOFF_MS)
 */
export function computeBackoffDelay(
  baseDelayMs: number,
  attempt: number,
  random: () => number = Math.random,
): number {
  const exponential = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.floor(random() * MAX_JITTER_MS);
  return Math.min(exponential + jitter, MAX_BACKOFF_MS);
}

/**
 * Run `fn`, retrying transient failures up to `attempts` times in total.
 * The last error is rethrown once attempts are exhausted, or when the
 * signal aborts between attempts.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const sleep = opts.sleep ?? defaultSleep;
  const attempts = Math.max(1, opts.attempts);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isTransient(err) || attempt + 1 >= attempts || opts.signal?.aborted) {
        throw err;
      }
      const delayMs = computeBackoffDelay(opts.baseDelayMs, attempt, opts.random);
      opts.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}

/**
 * Race a promise against a deadline.
 * @throws {AdapterTimeoutError} when the deadline passes first
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AdapterTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
