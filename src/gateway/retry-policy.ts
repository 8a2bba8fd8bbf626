import { ConfigurationError } from '../control-plane/errors.js';

export interface RetryPolicyOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  maxRetries: 3,
  baseDelayMs: 2000,
  maxDelayMs: 10_000,
};

export type Sleeper = (ms: number) => Promise<void>;

export const realSleep: Sleeper = (ms) => new Promise((r) => setTimeout(r, ms));

/**
 * Exponential backoff: the delay before retry `n` (0-based) is
 * `baseDelayMs * 2^n`, capped at `maxDelayMs`.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;

  constructor(options: Partial<RetryPolicyOptions> = {}) {
    const merged = { ...DEFAULT_RETRY_POLICY, ...options };
    for (const [key, value] of Object.entries(merged)) {
      if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(`Retry policy ${key} must be a non-negative integer, got ${value}`);
      }
    }
    if (merged.maxDelayMs < merged.baseDelayMs) {
      throw new ConfigurationError(
        `Retry policy maxDelayMs (${merged.maxDelayMs}) is below baseDelayMs (${merged.baseDelayMs})`
      );
    }
    this.maxRetries = merged.maxRetries;
    this.baseDelayMs = merged.baseDelayMs;
    this.maxDelayMs = merged.maxDelayMs;
  }

  canRetry(retriesUsed: number): boolean {
    return retriesUsed < this.maxRetries;
  }

  delayFor(retryIndex: number): number {
    return Math.min(this.baseDelayMs * 2 ** retryIndex, this.maxDelayMs);
  }

  schedule(): number[] {
    return Array.from({ length: this.maxRetries }, (_, i) => this.delayFor(i));
  }
}
