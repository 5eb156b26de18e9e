/**
 * Async Utility Functions
 *
 * Timeouts, retries under an explicit policy, rate limiting, cooperative
 * cancellation and bounded concurrency.
 *
 * @module
 */

import { CancelledError } from "../core/errors.js";

// =============================================================================
// Timeout
// =============================================================================

export class TimeoutError extends Error {
  constructor(message = "Operation timed out") {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * Wraps a promise with a timeout.
 * Rejects with a TimeoutError if the promise doesn't settle in time.
 */
export async function timeout<T>(
  promise: Promise<T>,
  ms: number,
  message = "Operation timed out"
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(message)), Math.max(0, ms));
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Retry policy shared by every external service client
 */
export interface RetryPolicy {
  /** Maximum number of attempts (including initial attempt) */
  maxAttempts: number;
  /** Initial delay between retries in milliseconds */
  initialDelayMs: number;
  /** Maximum delay between retries in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffFactor: number;
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
}

export interface RetryOptions extends Omit<RetryPolicy, "timeoutMs"> {
  /** Optional predicate to determine if error is retryable */
  retryIf?: (error: unknown) => boolean;
  /** Optional callback on each retry */
  onRetry?: (error: unknown, attempt: number) => void;
  /** Stops retrying once cancelled; the failed attempt then surfaces as a CancelledError */
  token?: CancellationToken;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8000,
  backoffFactor: 2,
  timeoutMs: 60_000,
};

/**
 * Retries a function with exponential backoff.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_POLICY, ...options };
  let lastError: unknown;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }

      if (attempt === opts.maxAttempts) {
        throw error;
      }

      opts.token?.throwIfCancelled();
      opts.onRetry?.(error, attempt);

      await sleep(delay);
      delay = Math.min(delay * opts.backoffFactor, opts.maxDelayMs);
    }
  }

  throw lastError;
}

// =============================================================================
// Rate Limiting
// =============================================================================

/**
 * Spaces out acquisitions so no more than `requestsPerSecond` start per
 * second. A rate of 0 disables limiting.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private nextSlot = 0;

  constructor(requestsPerSecond: number) {
    this.intervalMs = requestsPerSecond > 0 ? 1000 / requestsPerSecond : 0;
  }

  async acquire(): Promise<void> {
    if (this.intervalMs === 0) return;
    const now = Date.now();
    const wait = Math.max(0, this.nextSlot - now);
    this.nextSlot = Math.max(now, this.nextSlot) + this.intervalMs;
    if (wait > 0) {
      await sleep(wait);
    }
  }
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * A token that can be used to cancel async operations.
 * Follows the cancellation token pattern for cooperative cancellation.
 */
export class CancellationToken {
  private _cancelled = false;
  private _reason?: string;
  private listeners: Array<() => void> = [];

  get cancelled(): boolean {
    return this._cancelled;
  }

  get reason(): string | undefined {
    return this._reason;
  }

  cancel(reason?: string): void {
    if (!this._cancelled) {
      this._cancelled = true;
      this._reason = reason;
      this.listeners.forEach((fn) => fn());
      this.listeners = [];
    }
  }

  /**
   * Registers a callback to be called when the token is cancelled.
   * If already cancelled, the callback is invoked immediately.
   *
   * @returns Unsubscribe function
   */
  onCancel(fn: () => void): () => void {
    if (this._cancelled) {
      fn();
      return () => {};
    }
    this.listeners.push(fn);
    return () => {
      const idx = this.listeners.indexOf(fn);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  throwIfCancelled(): void {
    if (this._cancelled) {
      throw new CancelledError(this._reason);
    }
  }
}

/**
 * A CancellationToken source that owns and can cancel a token.
 */
export class CancellationTokenSource {
  readonly token: CancellationToken;

  constructor() {
    this.token = new CancellationToken();
  }

  cancel(reason?: string): void {
    this.token.cancel(reason);
  }
}

// =============================================================================
// Concurrency Utilities
// =============================================================================

export interface ConcurrencyOptions {
  concurrency: number;
  /** Checked before each item is taken; remaining items are left untouched */
  token?: CancellationToken;
  rateLimiter?: RateLimiter;
}

export interface ConcurrentRun {
  completed: number;
  cancelled: boolean;
}

/**
 * Runs an async function for each item with a concurrency limit.
 * Errors thrown by `fn` abort the run; callers that want per-item failure
 * isolation catch inside `fn`.
 */
export async function forEachConcurrent<T>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<void>,
  options: ConcurrencyOptions
): Promise<ConcurrentRun> {
  let currentIndex = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      if (options.token?.cancelled) return;
      const index = currentIndex++;
      const item = items[index];
      if (item === undefined) return;
      await options.rateLimiter?.acquire();
      await fn(item, index);
      completed++;
    }
  }

  const workerCount = Math.max(1, Math.min(options.concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return { completed, cancelled: options.token?.cancelled === true && completed < items.length };
}
