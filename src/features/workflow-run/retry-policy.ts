export interface RetryPolicyOptions {
  /** Maximum attempts for a step, first attempt included. */
  retryBound: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

/**
 * Attempt bound and bounded exponential backoff for spine steps.
 *
 * The delay after the n-th failed attempt is `backoffBaseMs × 2^(n-1)`,
 * capped at `backoffMaxMs`.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseMs: number;
  private readonly maxMs: number;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.retryBound));
    this.baseMs = Math.max(0, options.backoffBaseMs);
    this.maxMs = Math.max(0, options.backoffMaxMs);
  }

  /** Whether another attempt is allowed after `attemptsMade` attempts. */
  canRetry(attemptsMade: number): boolean {
    return attemptsMade < this.maxAttempts;
  }

  backoffMs(attemptsMade: number): number {
    if (attemptsMade < 1) return 0;
    return Math.min(this.baseMs * 2 ** (attemptsMade - 1), this.maxMs);
  }
}
