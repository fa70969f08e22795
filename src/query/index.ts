export {
  simple,
  exact,
  regex,
  anyOf,
  allOf,
  toSearchType,
  escapeTerm,
  formatSearchType,
  RESERVED_CHARACTERS,
} from './search-type.js';
export type { SearchType, SearchTypeInput } from './search-type.js';

export {
  Query,
  QUERY_FIELDS,
  isQueryField,
  formatQuery,
  validateQuery,
} from './query.js';
export type { QueryField, FieldQuery, FreeTextQuery } from './query.js';
