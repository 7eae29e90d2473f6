// src/core/search/terms.ts

export type OrderBy = 'relevant' | 'latest' | 'popular';
/** An ordering, optionally prefixed with `-` for descending. */
export type SearchOrder = OrderBy | `-${OrderBy}`;

export interface SearchTerms {
  include: string[];
  exclude: string[];
}

const ORDERS: readonly string[] = ['relevant', 'latest', 'popular'];

export function isSearchOrder(value: string): value is SearchOrder {
  return ORDERS.includes(value.startsWith('-') ? value.slice(1) : value);
}

/**
 * Splits a raw search string into include and exclude terms. Double-quoted
 * phrases stay whole; a leading `-` marks a term (or phrase) for exclusion.
 */
export function termsFromSearchString(raw: string): SearchTerms {
  const include: string[] = [];
  const exclude: string[] = [];
  const tokenPattern = /(-?)(?:"([^"]*)"?|(\S+))/g;

  for (const match of raw.matchAll(tokenPattern)) {
    const negated = match[1] === '-';
    const term = (match[2] ?? match[3] ?? '').replace(/\s+/g, ' ').trim();
    if (!term || term === '-') {
      continue;
    }
    (negated ? exclude : include).push(term);
  }

  return { include, exclude };
}

function quote(term: string): string {
  return /\s/.test(term) ? `"${term}"` : term;
}

export function searchStringFromTerms(include: string[], exclude: string[] = []): string {
  return [
    ...include.map(quote),
    ...exclude.map(term => `-${quote(term)}`),
  ].join(' ');
}
