/**
 * Configuration exports
 */

export {
  SearchApiConfig,
  SearchApiCredentialsMissingError,
  InvalidConfigurationError,
  DEFAULT_SEARCH_API_BASE_URL,
  type SearchApiCredentials,
  type SchedulerSettings,
} from './search-api.js';
