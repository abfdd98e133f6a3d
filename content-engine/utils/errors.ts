/**
 * Error taxonomy
 *
 * Every error raised by the engine carries a stable `code` so the batch
 * pipeline can report it as a `ModuleError` without string matching.
 */

export class IllustratorError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Credential rejected or billing required. Never retried.
 */
export class ProviderAuthError extends IllustratorError {
  readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super('E-PROVIDER-AUTH', `${provider}: ${message}`);
    this.status = status;
  }
}

/**
 * Rate limit, upstream 5xx or network failure. Retried with backoff.
 */
export class ProviderTransientError extends IllustratorError {
  readonly status?: number;

  constructor(provider: string, message: string, status?: number, cause?: unknown) {
    super('E-PROVIDER-TRANSIENT', `${provider}: ${message}`, { cause });
    this.status = status;
  }
}

/**
 * Poll loop exceeded its hard ceiling. Retried like a transient error.
 */
export class ProviderTimeoutError extends IllustratorError {
  readonly elapsedMs: number;

  constructor(provider: string, elapsedMs: number) {
    super('E-PROVIDER-TIMEOUT', `${provider}: job did not finish within ${elapsedMs}ms`);
    this.elapsedMs = elapsedMs;
  }
}

/**
 * Request rejected for a reason retrying cannot fix (bad model, 4xx, unreadable payload).
 */
export class ProviderRequestError extends IllustratorError {
  readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super('E-PROVIDER-REQUEST', `${provider}: ${message}`);
    this.status = status;
  }
}

export class CacheCorruptionError extends IllustratorError {
  constructor(key: string, cause: unknown) {
    super('E-CACHE-CORRUPT', `Cache entry ${key} could not be decoded`, { cause });
  }
}

export class ConfigError extends IllustratorError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('E-CONFIG', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function isRetryableProviderError(error: unknown): boolean {
  return error instanceof ProviderTransientError || error instanceof ProviderTimeoutError;
}
