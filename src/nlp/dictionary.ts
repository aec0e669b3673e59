import { readFileSync } from 'node:fs';
import wordListPath from 'word-list';
import type { WordDictionary } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * In-memory dictionary. Membership is exact and case-sensitive.
 */
export class WordSetDictionary implements WordDictionary {
    private readonly words: ReadonlySet<string>;

    constructor(words: Iterable<string>) {
        this.words = new Set(words);
    }

    has(word: string): boolean {
        return word.length > 0 && this.words.has(word);
    }

    get size(): number {
        return this.words.size;
    }
}

/**
 * Parse a newline-separated word list. Blank lines are skipped.
 */
export function parseWordList(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}

/**
 * One-letter words. The `word-list` file leaves them out.
 */
export const ONE_LETTER_WORDS: readonly string[] = ['a', 'A', 'I', 'i'];

/**
 * Load a dictionary from a word-list file.
 * Without a path, uses the English list shipped with the `word-list` package
 * plus the one-letter words.
 */
export function loadDictionary(path?: string): WordSetDictionary {
    const words = parseWordList(readFileSync(path ?? wordListPath, 'utf-8'));
    const dictionary = new WordSetDictionary(path === undefined ? [...words, ...ONE_LETTER_WORDS] : words);
    getLogger().debug({ path: path ?? wordListPath, words: dictionary.size }, 'Dictionary loaded');
    return dictionary;
}
