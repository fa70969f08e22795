/**
 * Breach Search Client
 *
 * Rate-limited access to a breach-data search API:
 * - Typed queries by email, domain, username, password, … or free text
 * - HTTP client mapping provider failures to typed errors
 * - A single-consumer scheduler that keeps every caller under the
 *   account's rate limit
 */

// Export query model
export * from './query/index.js';

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export clients
export * from './clients/index.js';

export const version = '0.1.0';
