/**
 * Search queries
 *
 * A query targets one indexed field with a SearchType, or carries a raw
 * free-text string that is sent to the provider untouched.
 */

import { SearchApiError } from '../clients/search-api/errors.js';
import {
  formatSearchType,
  toSearchType,
  type SearchType,
  type SearchTypeInput,
} from './search-type.js';

/**
 * Indexed fields, spelled as the provider expects them
 */
export const QUERY_FIELDS = [
  'email',
  'ip_address',
  'username',
  'password',
  'hashed_password',
  'name',
  'domain',
  'vin',
  'phone',
  'address',
] as const;

export type QueryField = (typeof QUERY_FIELDS)[number];

export interface FieldQuery {
  readonly field: QueryField;
  readonly search: SearchType;
}

export interface FreeTextQuery {
  readonly field: 'free_text';
  readonly text: string;
}

export type Query = FieldQuery | FreeTextQuery;

function fieldQuery(field: QueryField) {
  return (search: SearchTypeInput): Query =>
    Object.freeze({ field, search: toSearchType(search) });
}

/**
 * Query builders
 *
 * @example
 * ```typescript
 * Query.email(exact('jane@example.com'));
 * Query.domain(anyOf('example.com', exact('example.org')));
 * Query.freeText('jane doe');
 * ```
 */
export const Query = {
  email: fieldQuery('email'),
  ipAddress: fieldQuery('ip_address'),
  username: fieldQuery('username'),
  password: fieldQuery('password'),
  hashedPassword: fieldQuery('hashed_password'),
  name: fieldQuery('name'),
  domain: fieldQuery('domain'),
  vin: fieldQuery('vin'),
  phone: fieldQuery('phone'),
  address: fieldQuery('address'),
  freeText: (text: string): Query => Object.freeze({ field: 'free_text', text }),
} as const;

export function isQueryField(value: string): value is QueryField {
  return (QUERY_FIELDS as readonly string[]).includes(value);
}

/**
 * Render a query as the provider's `query` parameter
 */
export function formatQuery(query: Query): string {
  if (query.field === 'free_text') {
    return query.text;
  }
  return `${query.field}:${formatSearchType(query.search)}`;
}

function validateSearchType(searchType: SearchType, path: string): void {
  switch (searchType.type) {
    case 'simple':
    case 'exact':
    case 'regex':
      if (searchType.value.trim() === '') {
        throw SearchApiError.invalidInput(`empty ${searchType.type} term at ${path}`);
      }
      return;
    case 'or':
    case 'and':
      if (searchType.terms.length === 0) {
        throw SearchApiError.invalidInput(`empty '${searchType.type}' group at ${path}`);
      }
      searchType.terms.forEach((term, index) =>
        validateSearchType(term, `${path}.${searchType.type}[${index}]`)
      );
      return;
    default:
      throw SearchApiError.invalidInput(`unknown search type at ${path}`);
  }
}

/**
 * Reject queries the provider would refuse
 *
 * @throws SearchApiError of kind `invalid-input`
 */
export function validateQuery(query: Query): void {
  if (query.field === 'free_text') {
    if (query.text.trim() === '') {
      throw SearchApiError.invalidInput('empty free-text query');
    }
    return;
  }
  if (!isQueryField(query.field)) {
    throw SearchApiError.invalidInput(`unknown field '${String(query.field)}'`);
  }
  validateSearchType(query.search, query.field);
}
