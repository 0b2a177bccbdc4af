/**
 * Bounded exponential-backoff retry, used by sessions to ride out transient
 * socket read errors without spinning.
 */

import { TransportError } from "./errors.js";

// ---------------------------------------------------------------------------
// Retry configuration
// ---------------------------------------------------------------------------

export interface RetryOptions {
  /** Maximum number of retry attempts (not counting the initial try). Default: 3. */
  maxRetries?: number;
  /** Initial delay in milliseconds. Default: 10. */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds. Default: 200. */
  maxDelayMs?: number;
  /** Multiplier applied to delay between retries. Default: 2. */
  backoffMultiplier?: number;
}

export const DEFAULT_RETRY: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 10,
  maxDelayMs: 200,
  backoffMultiplier: 2,
};

/**
 * Default retry predicate: only transport errors classified as transient.
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof TransportError && error.transient;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry number `attempt` (0-based), with ±25% jitter.
 */
export function computeDelay(attempt: number, opts: Required<RetryOptions>): number {
  const base = opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt);
  const capped = Math.min(base, opts.maxDelayMs);
  const jitter = capped * 0.25 * (Math.random() * 2 - 1);
  return Math.max(0, capped + jitter);
}

export interface WithRetryOptions extends RetryOptions {
  /** Decide whether an error is worth another try. Default: {@link isTransientError}. */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each wait. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run `fn`, retrying retryable failures up to `maxRetries` times.
 * The last error is rethrown once attempts run out.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: WithRetryOptions = {}): Promise<T> {
  const { isRetryable = isTransientError, onRetry, ...rest } = options;
  const opts: Required<RetryOptions> = { ...DEFAULT_RETRY, ...definedOnly(rest) };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= opts.maxRetries || !isRetryable(error)) {
        throw error;
      }
      const delay = computeDelay(attempt, opts);
      onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }
}

function definedOnly(options: RetryOptions): RetryOptions {
  const out: RetryOptions = {};
  if (options.maxRetries !== undefined) out.maxRetries = options.maxRetries;
  if (options.initialDelayMs !== undefined) out.initialDelayMs = options.initialDelayMs;
  if (options.maxDelayMs !== undefined) out.maxDelayMs = options.maxDelayMs;
  if (options.backoffMultiplier !== undefined) out.backoffMultiplier = options.backoffMultiplier;
  return out;
}
