import type { Position } from '../types/index.js';

/**
 * PhraseFinder's single-token wildcard.
 */
export const WILDCARD = '?';

/**
 * Build the search pattern: `count` wildcards placed before or after the anchor word.
 * A count of 0 (or less) gives a pattern with no wildcards.
 *
 * "cat", "before", 2 → "? ? cat"
 */
export function buildPattern(word: string, position: Position, count: number): string {
    const wildcards = Array.from({ length: Math.max(0, count) }, () => WILDCARD).join(' ');
    return position === 'before' ? `${wildcards} ${word}` : `${word} ${wildcards}`;
}

/**
 * Percent-encode a pattern the way the search endpoint expects:
 * spaces become %20, never `+`.
 */
export function encodePattern(pattern: string): string {
    return encodeURIComponent(pattern);
}

/**
 * Assemble the query string for one search.
 */
export function buildQueryString(word: string, position: Position, count: number, corpus: string): string {
    const params: Record<string, string> = {
        corpus: encodeURIComponent(corpus),
        query: encodePattern(buildPattern(word, position, count)),
    };
    return Object.entries(params)
        .map(([name, value]) => `${name}=${value}`)
        .join('&');
}
