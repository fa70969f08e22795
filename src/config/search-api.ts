/**
 * Search API Configuration
 *
 * Credentials, endpoint and scheduler settings for the search API.
 *
 * Environment Variables:
 * - SEARCH_API_EMAIL                - Account email (required to search)
 * - SEARCH_API_KEY                  - Account API key (required to search)
 * - SEARCH_API_BASE_URL             - Search endpoint (default: https://api.dehashed.com/search)
 * - SEARCH_API_TIMEOUT_MS           - Per-request timeout (default: 10000)
 * - SEARCH_MIN_REQUEST_INTERVAL_MS  - Spacing between dispatches (default: 200)
 * - SEARCH_MAX_RETRIES              - Retries for rate-limited requests (default: 3)
 * - SEARCH_QUEUE_CAPACITY           - Queue bound (default: unbounded)
 *
 * Credentials are only validated when requested, so the configuration
 * can be loaded for scheduler settings alone.
 */

export const DEFAULT_SEARCH_API_BASE_URL = 'https://api.dehashed.com/search';

export interface SearchApiCredentials {
  email: string;
  apiKey: string;
}

export interface SchedulerSettings {
  minRequestIntervalMs: number;
  maxRetries: number;
  queueCapacity?: number;
}

/**
 * Error thrown when the account credentials are not configured
 */
export class SearchApiCredentialsMissingError extends Error {
  constructor(missing: string[]) {
    super(
      `Search API credentials not configured: ${missing.join(', ')} ` +
        'must be set (the API key is listed on the account profile page)'
    );
    this.name = 'SearchApiCredentialsMissingError';
  }
}

/**
 * Error thrown when a configuration variable holds an unusable value
 */
export class InvalidConfigurationError extends Error {
  constructor(variable: string, value: string, expected: string) {
    super(`${variable}=${value} is invalid: expected ${expected}`);
    this.name = 'InvalidConfigurationError';
  }
}

function readInteger(
  env: NodeJS.ProcessEnv,
  variable: string,
  min: number
): number | undefined {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidConfigurationError(variable, raw, `an integer >= ${min}`);
  }
  return value;
}

/**
 * Search API Configuration Manager
 *
 * Uses singleton pattern for convenient default access.
 */
export class SearchApiConfig {
  private static instance: SearchApiConfig | null = null;

  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly scheduler: SchedulerSettings;
  private readonly email?: string;
  private readonly apiKey?: string;

  /**
   * @param env - Environment to read from (defaults to process.env)
   * @throws InvalidConfigurationError for malformed numeric variables
   */
  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.email = env['SEARCH_API_EMAIL']?.trim() || undefined;
    this.apiKey = env['SEARCH_API_KEY']?.trim() || undefined;
    this.baseUrl = env['SEARCH_API_BASE_URL']?.trim() || DEFAULT_SEARCH_API_BASE_URL;
    this.timeoutMs = readInteger(env, 'SEARCH_API_TIMEOUT_MS', 1) ?? 10_000;
    this.scheduler = {
      minRequestIntervalMs: readInteger(env, 'SEARCH_MIN_REQUEST_INTERVAL_MS', 0) ?? 200,
      maxRetries: readInteger(env, 'SEARCH_MAX_RETRIES', 0) ?? 3,
      queueCapacity: readInteger(env, 'SEARCH_QUEUE_CAPACITY', 1),
    };
  }

  static getInstance(): SearchApiConfig {
    if (!SearchApiConfig.instance) {
      SearchApiConfig.instance = new SearchApiConfig();
    }
    return SearchApiConfig.instance;
  }

  /**
   * Reset singleton instance (useful for testing)
   */
  static resetInstance(): void {
    SearchApiConfig.instance = null;
  }

  hasCredentials(): boolean {
    return this.email !== undefined && this.apiKey !== undefined;
  }

  /**
   * @throws SearchApiCredentialsMissingError if either value is unset
   */
  getCredentials(): SearchApiCredentials {
    const missing: string[] = [];
    if (!this.email) missing.push('SEARCH_API_EMAIL');
    if (!this.apiKey) missing.push('SEARCH_API_KEY');
    if (!this.email || !this.apiKey) {
      throw new SearchApiCredentialsMissingError(missing);
    }
    return { email: this.email, apiKey: this.apiKey };
  }
}
