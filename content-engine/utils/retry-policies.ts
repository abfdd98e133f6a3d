/**
 * Retry Policies
 * Exponential backoff with jitter for provider calls.
 *
 * Whether an error is worth another attempt is decided by `isRetryable`
 * first, then by the message patterns in `retryableErrors`.
 */

import type { Logger } from './logger.js';
import { errorMessage, silentLogger } from './logger.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterMs: number;
  retryableErrors: (string | RegExp)[];
  isRetryable?: (error: Error) => boolean;
}

export interface RetryContext {
  operation: string;
  attempt: number;
  totalElapsedMs: number;
  lastError?: Error;
}

export interface RetryResult<T> {
  success: boolean;
  result?: T;
  error?: Error;
  attempts: number;
  totalTimeMs: number;
}

export interface RetryDependencies {
  sleep: (ms: number) => Promise<void>;
  random: () => number;
  now: () => number;
  logger: Logger;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  initialDelayMs: 2000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterMs: 500,
  retryableErrors: [
    /rate.?limit/i,
    /timeout/i,
    /network/i,
    /502|503|504/,
    'ECONNRESET',
    'ETIMEDOUT'
  ]
};

export const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export class RetryPolicy {
  private config: RetryConfig;
  private deps: RetryDependencies;

  constructor(config: Partial<RetryConfig> = {}, deps: Partial<RetryDependencies> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.deps = {
      sleep: deps.sleep ?? delay,
      random: deps.random ?? Math.random,
      now: deps.now ?? Date.now,
      logger: deps.logger ?? silentLogger
    };
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Run `operation` until it succeeds, fails with a non-retryable error, or
   * the attempt budget is spent. Never throws; the outcome is in the result.
   */
  async executeWithRetry<T>(operation: (context: RetryContext) => Promise<T>, operationId: string): Promise<RetryResult<T>> {
    const startTime = this.deps.now();
    const maxAttempts = Math.max(1, this.config.maxAttempts);
    let attempt = 0;
    let lastError: Error | undefined;

    while (attempt < maxAttempts) {
      attempt++;

      const context: RetryContext = {
        operation: operationId,
        attempt,
        totalElapsedMs: this.deps.now() - startTime,
        lastError
      };

      try {
        const result = await operation(context);
        return {
          success: true,
          result,
          attempts: attempt,
          totalTimeMs: this.deps.now() - startTime
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.isRetryableError(lastError)) {
          return {
            success: false,
            error: lastError,
            attempts: attempt,
            totalTimeMs: this.deps.now() - startTime
          };
        }

        if (attempt >= maxAttempts) {
          break;
        }

        const wait = this.calculateDelay(attempt);
        this.deps.logger('warn', `Retry attempt ${attempt}/${maxAttempts} for ${operationId} after ${wait}ms`, {
          error: errorMessage(lastError)
        });
        await this.deps.sleep(wait);
      }
    }

    return {
      success: false,
      error: lastError ?? new Error('All retry attempts failed'),
      attempts: attempt,
      totalTimeMs: this.deps.now() - startTime
    };
  }

  /**
   * Delay before attempt `attempt + 1`: exponential base plus jitter, capped.
   */
  calculateDelay(attempt: number): number {
    const baseDelay = this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const jitter = this.deps.random() * this.config.jitterMs;
    return Math.floor(Math.min(baseDelay + jitter, this.config.maxDelayMs));
  }

  private isRetryableError(error: Error): boolean {
    if (this.config.isRetryable) {
      return this.config.isRetryable(error);
    }

    return matchesRetryablePattern(error, this.config.retryableErrors);
  }
}

export function matchesRetryablePattern(error: Error, patterns: readonly (string | RegExp)[]): boolean {
  const errorString = `${error.name}: ${error.message}`;
  return patterns.some(pattern =>
    pattern instanceof RegExp
      ? pattern.test(errorString)
      : errorString.toLowerCase().includes(pattern.toLowerCase())
  );
}
