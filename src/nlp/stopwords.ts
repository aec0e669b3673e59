import { readFileSync } from 'node:fs';
import { eng } from 'stopword';
import type { StopwordSet } from '../types/index.js';

const ENGLISH_STOPWORDS_FILE = new URL('../../data/english-stopwords.json', import.meta.url);

/**
 * Read a JSON array of words.
 */
export function loadWordArray(file: URL | string): string[] {
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    if (!Array.isArray(parsed) || !parsed.every((w): w is string => typeof w === 'string')) {
        throw new Error(`${String(file)}: expected a JSON array of strings`);
    }
    return parsed;
}

/**
 * English stopwords: the `stopword` package's list merged with the classic
 * English list in data/english-stopwords.json (contractions and fragments
 * such as "don", "s" and "t" included).
 * Membership is exact: callers pass the candidate text as printed.
 */
export const STOPWORDS: ReadonlySet<string> = new Set([...eng, ...loadWordArray(ENGLISH_STOPWORDS_FILE)]);

/**
 * Build the stopword set, optionally extended with extra words.
 */
export function createStopwordSet(extra: readonly string[] = []): StopwordSet {
    if (extra.length === 0) return STOPWORDS;
    return new Set([...STOPWORDS, ...extra]);
}
