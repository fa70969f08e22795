/**
 * Clients Exports
 *
 * Third-party API clients
 */

export * from './search-api/index.js';
