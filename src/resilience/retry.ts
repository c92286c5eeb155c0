/**
 * Retry logic with exponential backoff.
 *
 * The client never retries on its own; callers opt in through
 * OrangicClient.withRetry() or by running a RetryPolicy themselves.
 */

import { isOrangicError, isRetryableError } from '../errors';
import { Logger, NoopLogger, toError } from '../observability';

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /** Maximum number of retry attempts after the first call. */
  maxRetries: number;
  /** Initial delay in milliseconds. */
  initialDelayMs: number;
  /** Maximum delay in milliseconds. */
  maxDelayMs: number;
  /** Multiplier for exponential backoff. */
  multiplier: number;
  /** Jitter factor (0-1) for randomizing delays. */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 500,
  maxDelayMs: 8000,
  multiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Retry policy for transient failures: rate limits, 5xx responses and
 * connection errors.
 */
export class RetryPolicy {
  private readonly config: RetryConfig;
  private readonly logger: Logger;

  constructor(config: Partial<RetryConfig> = {}, logger: Logger = new NoopLogger()) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.logger = logger;
  }

  /**
   * Executes a function, retrying retryable failures within the budget.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.config.maxRetries || !isRetryableError(error)) {
          throw error;
        }

        const delay = this.getDelay(error, attempt);
        this.logger.warn('Retrying request', {
          attempt: attempt + 1,
          maxRetries: this.config.maxRetries,
          delayMs: delay,
          reason: toError(error).message,
        });
        await this.sleep(delay);
      }
    }
  }

  /**
   * Calculates the delay before the next attempt, honouring retry-after.
   */
  getDelay(error: unknown, attempt: number): number {
    if (isOrangicError(error)) {
      const retryAfter = error.getRetryAfter();
      if (retryAfter !== undefined) {
        return retryAfter * 1000;
      }
    }

    const baseDelay = this.config.initialDelayMs * Math.pow(this.config.multiplier, attempt);
    const cappedDelay = Math.min(baseDelay, this.config.maxDelayMs);

    const jitter = cappedDelay * this.config.jitterFactor * (Math.random() * 2 - 1);
    return Math.max(0, cappedDelay + jitter);
  }

  /**
   * Creates a new retry policy with updated config.
   */
  withConfig(config: Partial<RetryConfig>): RetryPolicy {
    return new RetryPolicy({ ...this.config, ...config }, this.logger);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
