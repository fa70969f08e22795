/**
 * Search API error taxonomy
 */

/**
 * Failure categories reported by the Search Executor.
 *
 * `rate-limit-exceeded` is the only kind the scheduler retries.
 */
export type SearchApiErrorKind =
  | 'unauthorized'
  | 'rate-limit-exceeded'
  | 'network'
  | 'malformed-response'
  | 'invalid-input'
  | 'unknown';

export interface SearchApiErrorOptions {
  /** HTTP status that produced the error, when there was a response */
  statusCode?: number;
  /** Provider-requested wait before the next attempt (from Retry-After) */
  retryAfterMs?: number;
  cause?: unknown;
}

/**
 * Error thrown by the Search API client
 */
export class SearchApiError extends Error {
  readonly kind: SearchApiErrorKind;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;

  constructor(
    kind: SearchApiErrorKind,
    message: string,
    options: SearchApiErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SearchApiError';
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
  }

  static unauthorized(statusCode: number): SearchApiError {
    return new SearchApiError('unauthorized', 'Invalid API credentials', {
      statusCode,
    });
  }

  static rateLimited(statusCode?: number, retryAfterMs?: number): SearchApiError {
    return new SearchApiError('rate-limit-exceeded', 'The account got rate limited', {
      statusCode,
      retryAfterMs,
    });
  }

  static network(cause: unknown): SearchApiError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new SearchApiError('network', `Network failure: ${detail}`, { cause });
  }

  static malformed(detail: string, cause?: unknown): SearchApiError {
    return new SearchApiError('malformed-response', `Malformed response: ${detail}`, {
      cause,
    });
  }

  static invalidInput(detail: string, statusCode?: number): SearchApiError {
    return new SearchApiError('invalid-input', `Invalid query: ${detail}`, {
      statusCode,
    });
  }
}

export function isSearchApiError(error: unknown): error is SearchApiError {
  return error instanceof SearchApiError;
}

export function isRateLimitError(
  error: unknown
): error is SearchApiError & { readonly kind: 'rate-limit-exceeded' } {
  return isSearchApiError(error) && error.kind === 'rate-limit-exceeded';
}

/**
 * Normalize anything thrown by an executor into a SearchApiError
 */
export function toSearchApiError(error: unknown): SearchApiError {
  if (isSearchApiError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SearchApiError('unknown', `Unexpected executor failure: ${message}`, {
    cause: error,
  });
}
