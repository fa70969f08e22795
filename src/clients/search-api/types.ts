/**
 * Search API Types
 */

import type { Query } from '../../query/index.js';

/**
 * One leaked record
 *
 * Fields the provider leaves empty are absent.
 */
export interface SearchEntry {
  /** Provider record ID */
  id: number;
  email?: string;
  username?: string;
  password?: string;
  hashedPassword?: string;
  /** IPv4 or IPv6 address */
  ipAddress?: string;
  name?: string;
  vin?: string;
  address?: string;
  phone?: string;
  /** Source breach the record comes from */
  databaseName?: string;
}

/**
 * Result of one query across all result pages
 */
export interface SearchResult {
  /** Total number of matches reported by the provider */
  total: number;
  /** Remaining account balance after the query */
  balance: number;
  entries: SearchEntry[];
}

/**
 * Capability that performs a single query against the provider
 *
 * Rejects with a SearchApiError; `rate-limit-exceeded` is reported
 * separately from every other failure.
 */
export interface SearchExecutor {
  execute(query: Query): Promise<SearchResult>;
}

/**
 * Raw entry as returned by the API
 *
 * Every value is a string; unknown values are empty, null or missing.
 */
export interface RawSearchEntry {
  id: string;
  email?: string | null;
  username?: string | null;
  password?: string | null;
  hashed_password?: string | null;
  ip_address?: string | null;
  name?: string | null;
  vin?: string | null;
  address?: string | null;
  phone?: string | null;
  database_name?: string | null;
}

/**
 * Raw page body from GET /search
 */
export interface RawSearchResponse {
  balance: number;
  /** null when nothing matched */
  entries: RawSearchEntry[] | null;
  success: boolean;
  took: string;
  total: number;
}
