/**
 * Search API Client
 *
 * HTTP implementation of the Search Executor for the breach search API.
 *
 * Features:
 * - Basic authentication with account email and API key
 * - Transparent pagination (10 000 entries per page)
 * - Status mapping to SearchApiError kinds, rate limiting kept distinct
 * - Response validation and normalization of empty fields
 *
 * The client performs no throttling of its own; share one
 * RequestScheduler (see startScheduler) between all callers.
 *
 * @see https://www.dehashed.com/docs
 */

import { isIP } from 'node:net';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { SearchApiConfig } from '../../config/index.js';
import { formatQuery, validateQuery, type Query } from '../../query/index.js';
import {
  RequestScheduler,
  type RequestSchedulerOptions,
} from '../../utils/request-scheduler/index.js';
import { SearchApiError } from './errors.js';
import type {
  RawSearchEntry,
  RawSearchResponse,
  SearchEntry,
  SearchExecutor,
  SearchResult,
} from './types.js';

/**
 * Entries requested per page
 */
export const PAGE_SIZE = 10_000;

const RAW_ENTRY_FIELDS = [
  'id',
  'email',
  'username',
  'password',
  'hashed_password',
  'ip_address',
  'name',
  'vin',
  'address',
  'phone',
  'database_name',
] as const;

export interface SearchApiClientDependencies {
  /**
   * Account email
   * If not provided, SEARCH_API_EMAIL is used
   */
  email?: string;

  /**
   * Account API key
   * If not provided, SEARCH_API_KEY is used
   */
  apiKey?: string;

  /**
   * Search endpoint, must be HTTPS
   * @default 'https://api.dehashed.com/search'
   */
  baseUrl?: string;

  /**
   * Per-request timeout in milliseconds
   * @default 10000
   */
  timeoutMs?: number;

  /**
   * Minimum spacing between two page requests of one query
   * @default the configured scheduler interval (200)
   */
  pageIntervalMs?: number;

  /**
   * Configuration used for every value not given above
   * If not provided, the singleton SearchApiConfig instance will be used
   */
  config?: SearchApiConfig;
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now()
): number | undefined {
  if (header === null || header.trim() === '') {
    return undefined;
  }

  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = new Date(header).getTime();
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRawEntry(value: unknown): value is RawSearchEntry {
  if (!isRecord(value)) return false;
  if (typeof value['id'] !== 'string') return false;
  return RAW_ENTRY_FIELDS.every((field) => {
    const fieldValue = value[field];
    return fieldValue === undefined || fieldValue === null || typeof fieldValue === 'string';
  });
}

/**
 * Validate a raw page body
 *
 * @throws SearchApiError of kind `malformed-response`
 */
export function parseSearchResponse(body: unknown): RawSearchResponse {
  if (!isRecord(body)) {
    throw SearchApiError.malformed('body is not a JSON object');
  }

  const { balance, entries, success, took, total } = body;

  if (success !== true) {
    throw SearchApiError.malformed(
      typeof body['message'] === 'string'
        ? `request reported failure: ${body['message']}`
        : 'request reported failure'
    );
  }
  if (typeof balance !== 'number' || typeof total !== 'number') {
    throw SearchApiError.malformed('balance and total must be numbers');
  }
  let list: unknown[] = [];
  if (Array.isArray(entries)) {
    list = entries;
  } else if (entries !== null && entries !== undefined) {
    throw SearchApiError.malformed('entries must be an array');
  }

  const rawEntries: RawSearchEntry[] = [];
  for (const [index, entry] of list.entries()) {
    if (!isRawEntry(entry)) {
      throw SearchApiError.malformed(`entry ${index} has an unexpected shape`);
    }
    rawEntries.push(entry);
  }

  return {
    balance,
    total,
    success,
    took: typeof took === 'string' ? took : '',
    entries: rawEntries,
  };
}

function present(value: string | null | undefined): string | undefined {
  return value === null || value === undefined || value === '' ? undefined : value;
}

/**
 * Normalize a raw entry: empty strings become absent fields
 *
 * @throws SearchApiError of kind `malformed-response` for a bad id or IP address
 */
export function toSearchEntry(raw: RawSearchEntry): SearchEntry {
  const id = Number(raw.id);
  if (raw.id.trim() === '' || !Number.isSafeInteger(id) || id < 0) {
    throw SearchApiError.malformed(`invalid entry id '${raw.id}'`);
  }

  const ipAddress = present(raw.ip_address);
  if (ipAddress !== undefined && isIP(ipAddress) === 0) {
    throw SearchApiError.malformed(`invalid ip address '${ipAddress}' in entry ${id}`);
  }

  const entry: SearchEntry = { id };
  const optional: Array<[Exclude<keyof SearchEntry, 'id'>, string | undefined]> = [
    ['email', present(raw.email)],
    ['username', present(raw.username)],
    ['password', present(raw.password)],
    ['hashedPassword', present(raw.hashed_password)],
    ['ipAddress', ipAddress],
    ['name', present(raw.name)],
    ['vin', present(raw.vin)],
    ['address', present(raw.address)],
    ['phone', present(raw.phone)],
    ['databaseName', present(raw.database_name)],
  ];
  for (const [key, value] of optional) {
    if (value !== undefined) {
      entry[key] = value;
    }
  }
  return entry;
}

/**
 * Search API Client
 *
 * Uses singleton pattern for convenient default access.
 */
export class SearchApiClient implements SearchExecutor {
  private static instance: SearchApiClient | null = null;

  private readonly email: string;
  private readonly apiKey: string;
  private readonly baseUrl: URL;
  private readonly timeoutMs: number;
  private readonly pageIntervalMs: number;
  private readonly config: SearchApiConfig;
  private readonly logger: ServiceLogger;

  /**
   * @throws SearchApiCredentialsMissingError if no credentials are available
   * @throws Error if the base URL is not an HTTPS URL
   */
  constructor(dependencies: SearchApiClientDependencies = {}) {
    this.logger = createServiceLogger('SearchApiClient');
    this.config = dependencies.config ?? SearchApiConfig.getInstance();

    const credentials =
      dependencies.email !== undefined && dependencies.apiKey !== undefined
        ? { email: dependencies.email, apiKey: dependencies.apiKey }
        : this.config.getCredentials();

    this.email = credentials.email;
    // The provider expects the key in lower case
    this.apiKey = credentials.apiKey.toLowerCase();
    this.timeoutMs = dependencies.timeoutMs ?? this.config.timeoutMs;
    this.pageIntervalMs =
      dependencies.pageIntervalMs ?? this.config.scheduler.minRequestIntervalMs;

    this.baseUrl = new URL(dependencies.baseUrl ?? this.config.baseUrl);
    if (this.baseUrl.protocol !== 'https:') {
      throw new Error(`Search API base URL must use HTTPS, got ${this.baseUrl.origin}`);
    }

    this.logger.info({ endpoint: this.baseUrl.origin }, 'SearchApiClient initialized');
  }

  static getInstance(): SearchApiClient {
    if (!SearchApiClient.instance) {
      SearchApiClient.instance = new SearchApiClient();
    }
    return SearchApiClient.instance;
  }

  /**
   * Reset singleton instance (useful for testing)
   */
  static resetInstance(): void {
    SearchApiClient.instance = null;
  }

  /**
   * Start a scheduler that routes every query through this client
   *
   * Unset options fall back to the configured scheduler settings. Start
   * one scheduler per account and share it: two schedulers do not
   * coordinate and together exceed the rate limit.
   */
  startScheduler(options: RequestSchedulerOptions = {}): RequestScheduler {
    return new RequestScheduler(this, {
      ...this.config.scheduler,
      name: 'SearchScheduler',
      ...options,
    });
  }

  /**
   * Run one query, following every result page
   *
   * Pages of one query are spaced by `pageIntervalMs`. Separate queries
   * are not; the provider bans accounts doing more than 5 requests per
   * second, so route concurrent callers through one scheduler.
   *
   * @throws SearchApiError
   */
  async execute(query: Query): Promise<SearchResult> {
    validateQuery(query);
    const queryString = formatQuery(query);
    log.methodEntry(this.logger, 'execute', { field: query.field });

    const result: SearchResult = { total: 0, balance: 0, entries: [] };

    let lastPageAt: number | null = null;
    for (let page = 1; ; page++) {
      if (lastPageAt !== null) {
        await this.waitForPageSlot(lastPageAt);
      }
      const response = await this.fetchPage(queryString, page);
      lastPageAt = Date.now();
      const entries = response.entries ?? [];

      for (const entry of entries) {
        result.entries.push(toSearchEntry(entry));
      }
      result.balance = response.balance;
      result.total = response.total;

      if (response.total < page * PAGE_SIZE || entries.length === 0) {
        break;
      }
    }

    log.methodExit(this.logger, 'execute', {
      field: query.field,
      total: result.total,
      entries: result.entries.length,
      balance: result.balance,
    });
    return result;
  }

  private async waitForPageSlot(lastPageAt: number): Promise<void> {
    // Re-read the clock after each sleep; timers may fire early
    for (
      let waitMs = lastPageAt + this.pageIntervalMs - Date.now();
      waitMs > 0;
      waitMs = lastPageAt + this.pageIntervalMs - Date.now()
    ) {
      await new Promise((resolve) => setTimeout(resolve, waitMs));
    }
  }

  private authorizationHeader(): string {
    const token = Buffer.from(`${this.email}:${this.apiKey}`).toString('base64');
    return `Basic ${token}`;
  }

  private async fetchPage(queryString: string, page: number): Promise<RawSearchResponse> {
    const url = new URL(this.baseUrl);
    url.searchParams.set('size', String(PAGE_SIZE));
    url.searchParams.set('query', queryString);
    url.searchParams.set('page', String(page));

    log.externalApiCall(this.logger, 'SearchAPI', url.pathname, { page, size: PAGE_SIZE });

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          Authorization: this.authorizationHeader(),
        },
        redirect: 'manual',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const wrapped = SearchApiError.network(error);
      log.methodError(this.logger, 'fetchPage', wrapped, { page });
      throw wrapped;
    }

    if (response.status !== 200) {
      throw this.errorForStatus(response);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw SearchApiError.malformed('body is not valid JSON', error);
    }
    return parseSearchResponse(body);
  }

  /**
   * Map a non-200 response to its SearchApiError
   *
   * The provider answers throttled accounts with 400 as well as 429, and
   * a missing or invalid query with a 302 redirect.
   */
  private errorForStatus(response: Response): SearchApiError {
    const { status } = response;

    if (status === 429 || status === 400) {
      const retryAfterMs = parseRetryAfter(response.headers.get('Retry-After'));
      this.logger.warn({ status, retryAfterMs }, 'Search API rate limit hit');
      return SearchApiError.rateLimited(status, retryAfterMs);
    }
    if (status === 401 || status === 403) {
      return SearchApiError.unauthorized(status);
    }
    if (status === 302) {
      return SearchApiError.invalidInput('the provider rejected the query', status);
    }
    return new SearchApiError(
      'unknown',
      `Search API error: ${status} ${response.statusText}`.trim(),
      { statusCode: status }
    );
  }
}
