/**
 * Error taxonomy
 *
 * Every error raised by the library extends DelveError and carries a stable
 * `code`, optional structured `context` and the time it was raised.
 *
 * - ProviderError: LLM, search or embedding call failed (transient or permanent)
 * - ParseError: structured LLM output did not validate
 * - ConfigurationError: invalid bounds or embedding dimension mismatch; never retried
 * - StoreError: history persistence failed
 */

export type ProviderKind = 'llm' | 'search' | 'embedding';

export interface DelveErrorOptions {
  readonly context?: Record<string, unknown>;
  readonly cause?: unknown;
}

export class DelveError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, code: string, options: DelveErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.context = options.context;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ---------- Provider errors ----------

export class ProviderError extends DelveError {
  public readonly provider: ProviderKind;

  constructor(message: string, provider: ProviderKind, code = 'PROVIDER_ERROR', options: DelveErrorOptions = {}) {
    super(message, code, options);
    this.provider = provider;
  }
}

export class ProviderUnavailableError extends ProviderError {
  constructor(message: string, provider: ProviderKind = 'llm', options: DelveErrorOptions = {}) {
    super(message, provider, 'PROVIDER_UNAVAILABLE', options);
  }
}

export class ProviderTimeoutError extends ProviderError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, provider: ProviderKind = 'llm') {
    super(`${operation} timed out after ${timeoutMs}ms`, provider, 'PROVIDER_TIMEOUT', {
      context: { operation, timeoutMs }
    });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The provider answered, but the answer was not the structured object asked for.
 * `issues` holds the parse/validation messages so a caller can re-prompt with them.
 */
export class ProviderMalformedResponseError extends ProviderError {
  public readonly issues: readonly string[];
  public readonly raw: string;

  constructor(issues: readonly string[], raw: string) {
    super(`Malformed structured response: ${issues.join('; ')}`, 'llm', 'PROVIDER_MALFORMED_RESPONSE', {
      context: { issues }
    });
    this.issues = issues;
    this.raw = raw;
  }
}

export class SearchUnavailableError extends ProviderError {
  constructor(message: string, options: DelveErrorOptions = {}) {
    super(message, 'search', 'SEARCH_UNAVAILABLE', options);
  }
}

export class SearchRateLimitedError extends ProviderError {
  constructor(message = 'Search provider rate limit exceeded', options: DelveErrorOptions = {}) {
    super(message, 'search', 'SEARCH_RATE_LIMITED', options);
  }
}

// ---------- Component errors ----------

export class ParseError extends DelveError {
  constructor(message: string, code = 'PARSE_ERROR', options: DelveErrorOptions = {}) {
    super(message, code, options);
  }
}

export class ReflectionParseError extends ParseError {
  constructor(message: string, options: DelveErrorOptions = {}) {
    super(message, 'REFLECTION_PARSE_ERROR', options);
  }
}

export class SummaryGenerationError extends DelveError {
  constructor(message: string, options: DelveErrorOptions = {}) {
    super(message, 'SUMMARY_GENERATION_ERROR', options);
  }
}

export class ConfigurationError extends DelveError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options: DelveErrorOptions = {}) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIGURATION_ERROR', options);
    this.issues = issues;
  }
}

export class InvalidArgumentError extends DelveError {
  constructor(message: string, options: DelveErrorOptions = {}) {
    super(message, 'INVALID_ARGUMENT', options);
  }
}

export class StoreError extends DelveError {
  constructor(message: string, code = 'STORE_ERROR', options: DelveErrorOptions = {}) {
    super(message, code, options);
  }
}

export class StoreWriteError extends StoreError {
  constructor(message: string, options: DelveErrorOptions = {}) {
    super(message, 'STORE_WRITE_ERROR', options);
  }
}

// ---------- Helpers ----------

/**
 * Errors that a retry can never fix
 */
export const isFatal = (error: unknown): boolean =>
  error instanceof ConfigurationError || error instanceof InvalidArgumentError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
