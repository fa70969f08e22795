/**
 * Match modes for a single field search
 */

export type SearchType =
  /** Unquoted term, analysed by the provider */
  | { readonly type: 'simple'; readonly value: string }
  /** Quoted phrase, matched exactly */
  | { readonly type: 'exact'; readonly value: string }
  /** Regular expression, sent between slashes */
  | { readonly type: 'regex'; readonly value: string }
  /** Any of the terms */
  | { readonly type: 'or'; readonly terms: readonly SearchType[] }
  /** All of the terms */
  | { readonly type: 'and'; readonly terms: readonly SearchType[] };

export type SearchTypeInput = SearchType | string;

/**
 * Characters with a meaning in the provider's query syntax
 */
export const RESERVED_CHARACTERS: ReadonlySet<string> = new Set([
  '+', '-', '=', '&', '|', '>', '<', '!', '(', ')', '{', '}',
  '[', ']', '^', '"', '~', '*', '?', ':', '\\',
]);

export function simple(value: string): SearchType {
  return Object.freeze({ type: 'simple', value });
}

export function exact(value: string): SearchType {
  return Object.freeze({ type: 'exact', value });
}

export function regex(pattern: string): SearchType {
  return Object.freeze({ type: 'regex', value: pattern });
}

export function anyOf(...terms: SearchTypeInput[]): SearchType {
  return Object.freeze({ type: 'or', terms: Object.freeze(terms.map(toSearchType)) });
}

export function allOf(...terms: SearchTypeInput[]): SearchType {
  return Object.freeze({ type: 'and', terms: Object.freeze(terms.map(toSearchType)) });
}

/**
 * Plain strings become `simple` terms
 */
export function toSearchType(input: SearchTypeInput): SearchType {
  return typeof input === 'string' ? simple(input) : input;
}

/**
 * Backslash-escape every reserved character in a term
 *
 * @example
 * ```typescript
 * escapeTerm('a+b@example.com'); // 'a\\+b@example.com'
 * ```
 */
export function escapeTerm(term: string): string {
  let escaped = '';
  for (const char of term) {
    escaped += RESERVED_CHARACTERS.has(char) ? `\\${char}` : char;
  }
  return escaped;
}

/**
 * Render a search type in the provider's query syntax
 *
 * Groups are parenthesised so they stay bound to their field.
 * Regex patterns keep their own syntax; only the delimiter is escaped.
 */
export function formatSearchType(searchType: SearchType): string {
  switch (searchType.type) {
    case 'simple':
      return escapeTerm(searchType.value);
    case 'exact':
      return `"${escapeTerm(searchType.value)}"`;
    case 'regex':
      return `/${searchType.value.replace(/\//g, '\\/')}/`;
    case 'or':
      return `(${searchType.terms.map(formatSearchType).join(' OR ')})`;
    case 'and':
      return `(${searchType.terms.map(formatSearchType).join(' ')})`;
  }
}
