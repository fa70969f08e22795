/**
 * Search API Client Exports
 */

export {
  SearchApiClient,
  PAGE_SIZE,
  parseRetryAfter,
  parseSearchResponse,
  toSearchEntry,
  type SearchApiClientDependencies,
} from './search-api-client.js';

export {
  SearchApiError,
  isSearchApiError,
  isRateLimitError,
  toSearchApiError,
  type SearchApiErrorKind,
  type SearchApiErrorOptions,
} from './errors.js';

export type {
  SearchEntry,
  SearchResult,
  SearchExecutor,
  RawSearchEntry,
  RawSearchResponse,
} from './types.js';
