/**
 * Image Provider Gateway
 *
 * Wraps one `ImageProvider` with the run-wide failure policy:
 * - throttled calls, retried with exponential backoff on transient failures
 * - auth failures never retried; the first one opens the circuit for the run
 * - every successful payload re-encoded as canonical PNG
 * - once retries are spent, a placeholder (default) or the error (`strict`)
 */

import {
  IllustratorError,
  ProviderAuthError,
  ProviderRequestError,
  isRetryableProviderError
} from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { errorMessage, silentLogger } from '../../utils/logger.js';
import { RequestThrottle } from '../../utils/rate-limiter.js';
import type { ThrottleMetrics } from '../../utils/rate-limiter.js';
import type { RetryConfig, RetryDependencies } from '../../utils/retry-policies.js';
import { DEFAULT_RETRY_CONFIG, RetryPolicy, matchesRetryablePattern } from '../../utils/retry-policies.js';
import { createPlaceholder } from './placeholder.js';
import { decodeImage, toCanonicalPng } from './raster.js';
import type { FailureMode, GenerationRequest, ImageProvider, ImageSize, RenderedImage } from './types.js';

export interface GatewayOptions {
  failureMode: FailureMode;
  failOnAuthError: boolean;
  requestIntervalMs: number;
  retry: Partial<RetryConfig>;
}

export const DEFAULT_GATEWAY_OPTIONS: GatewayOptions = {
  failureMode: 'placeholder',
  failOnAuthError: false,
  requestIntervalMs: 3000,
  retry: {}
};

export interface GenerateOptions {
  seed?: number;
  negativePrompt?: string;
}

export interface GatewayMetrics {
  requests_total: number;
  provider_calls_total: number;
  successes_total: number;
  placeholders_total: number;
  auth_failures_total: number;
  circuit_open: boolean;
  throttle: ThrottleMetrics;
}

export class ImageGateway {
  private options: GatewayOptions;
  private retryPolicy: RetryPolicy;
  private throttle: RequestThrottle;
  private authFailure?: ProviderAuthError;
  private metrics = {
    requests_total: 0,
    provider_calls_total: 0,
    successes_total: 0,
    placeholders_total: 0,
    auth_failures_total: 0
  };

  constructor(
    private provider: ImageProvider,
    options: Partial<GatewayOptions> = {},
    private logger: Logger = silentLogger,
    deps: Partial<RetryDependencies> = {}
  ) {
    this.options = { ...DEFAULT_GATEWAY_OPTIONS, ...options };
    this.retryPolicy = new RetryPolicy(
      { ...this.options.retry, isRetryable: shouldRetry },
      { ...deps, logger: deps.logger ?? logger }
    );
    this.throttle = new RequestThrottle(this.options.requestIntervalMs, deps.sleep, deps.now);
  }

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Obtain an image for `prompt` with the full failure policy applied.
   * Resolves to a placeholder unless `strict` mode or `failOnAuthError` says otherwise.
   */
  async generate(prompt: string, size: ImageSize, options: GenerateOptions = {}): Promise<RenderedImage> {
    try {
      const bytes = await this.fetchImage({ prompt, ...size, ...options });
      return await decodeImage(bytes, 'provider');
    } catch (error) {
      return this.recover(error, size);
    }
  }

  /**
   * Canonical PNG bytes from the provider, retried; throws the final error.
   * This is the fetch step the image cache calls on a miss.
   */
  async fetchImage(request: GenerationRequest): Promise<Buffer> {
    this.metrics.requests_total++;

    if (this.authFailure) {
      throw this.authFailure;
    }

    const outcome = await this.retryPolicy.executeWithRetry(async context => {
      await this.throttle.acquire();
      this.metrics.provider_calls_total++;
      this.logger('debug', `Requesting image from ${this.provider.name}`, {
        attempt: context.attempt,
        width: request.width,
        height: request.height
      });

      const bytes = await this.provider.generate(request);
      try {
        return (await toCanonicalPng(bytes)).data;
      } catch (cause) {
        throw new ProviderRequestError(this.provider.name, `payload is not a readable image (${errorMessage(cause)})`);
      }
    }, `${this.provider.name}.generate`);

    if (outcome.success && outcome.result !== undefined) {
      this.metrics.successes_total++;
      return outcome.result;
    }

    const error = outcome.error ?? new Error(`${this.provider.name}: generation failed`);
    if (error instanceof ProviderAuthError) {
      this.metrics.auth_failures_total++;
      this.authFailure = error;
      this.logger('warn', `Disabling ${this.provider.name} for the rest of the run`, { error: error.message });
    }
    throw error;
  }

  /**
   * Turn a failed fetch into the configured fallback.
   */
  async recover(error: unknown, size: ImageSize): Promise<RenderedImage> {
    if (error instanceof ProviderAuthError) {
      if (this.options.failOnAuthError) {
        throw error;
      }
    } else if (this.options.failureMode === 'strict') {
      throw error;
    }

    this.metrics.placeholders_total++;
    this.logger('warn', 'Image generation failed; using placeholder', {
      provider: this.provider.name,
      code: error instanceof IllustratorError ? error.code : undefined,
      error: errorMessage(error)
    });
    return createPlaceholder(size);
  }

  getMetrics(): GatewayMetrics {
    return { ...this.metrics, circuit_open: this.authFailure !== undefined, throttle: this.throttle.getMetrics() };
  }
}

/**
 * Provider errors carry their own classification; anything else falls back
 * to the message patterns.
 */
function shouldRetry(error: Error): boolean {
  if (error instanceof IllustratorError) {
    return isRetryableProviderError(error);
  }
  return matchesRetryablePattern(error, DEFAULT_RETRY_CONFIG.retryableErrors);
}
