/**
 * Backoff for rate-limited retries
 *
 * Exponential backoff with jitter. A provider-supplied Retry-After
 * delay takes priority over the computed curve.
 */

export interface BackoffOptions {
  /**
   * Delay before the first retry in milliseconds
   * @default 800
   */
  baseDelayMs: number;

  /**
   * Upper bound for any single delay in milliseconds
   * @default 8000
   */
  maxDelayMs: number;

  /**
   * Random jitter added on top, drawn from [0, jitterMs)
   * @default 200
   */
  jitterMs: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseDelayMs: 800,
  maxDelayMs: 8000,
  jitterMs: 200,
};

export function resolveBackoffOptions(
  overrides: Partial<BackoffOptions> = {}
): BackoffOptions {
  const options = { ...DEFAULT_BACKOFF, ...overrides };

  for (const [key, value] of Object.entries(options)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`Backoff option ${key} must be a non-negative number, got ${value}`);
    }
  }
  if (options.maxDelayMs < options.baseDelayMs) {
    throw new RangeError('Backoff maxDelayMs must not be lower than baseDelayMs');
  }

  return options;
}

/**
 * Delay before retry number `retry` (0-based)
 *
 * @param retry - How many retries already happened for this request
 * @param retryAfterMs - Wait requested by the provider, if any
 * @param random - Source of randomness in [0, 1)
 *
 * @example
 * ```typescript
 * computeBackoffDelay(0, { baseDelayMs: 800, maxDelayMs: 8000, jitterMs: 0 }); // 800
 * computeBackoffDelay(3, { baseDelayMs: 800, maxDelayMs: 8000, jitterMs: 0 }); // 6400
 * computeBackoffDelay(5, { baseDelayMs: 800, maxDelayMs: 8000, jitterMs: 0 }); // 8000
 * ```
 */
export function computeBackoffDelay(
  retry: number,
  options: BackoffOptions,
  retryAfterMs?: number,
  random: () => number = Math.random
): number {
  const { baseDelayMs, maxDelayMs, jitterMs } = options;

  const delay =
    retryAfterMs !== undefined
      ? Math.min(maxDelayMs, Math.max(baseDelayMs, retryAfterMs))
      : Math.min(maxDelayMs, baseDelayMs * 2 ** retry);

  return delay + Math.floor(random() * jitterMs);
}
