import type { Candidate, PhraseRecord, PhraseToken, Position, WordDictionary } from '../types/index.js';

/**
 * Records at or below this relevance score are dropped.
 */
export const DEFAULT_SCORE_THRESHOLD = 0.001;

/**
 * Tokens that sit in the wildcard slots of a phrase.
 *
 * - `after`: everything past the anchor, which is the first token.
 * - `before`: the `count` tokens right before the anchor, which is the last token.
 */
export function wildcardTokens(tokens: readonly PhraseToken[], position: Position, count: number): PhraseToken[] {
    if (position === 'after') {
        return tokens.slice(1);
    }
    return tokens.slice(-1 - Math.max(0, count), -1);
}

/**
 * Turn phrase records into candidates.
 * A record is kept only if its score is above the threshold and every
 * wildcard token is a dictionary word; the candidate weight is its match count.
 */
export function collectCandidates(
    phrases: readonly PhraseRecord[],
    position: Position,
    count: number,
    dictionary: WordDictionary,
    scoreThreshold: number = DEFAULT_SCORE_THRESHOLD
): Candidate[] {
    const candidates: Candidate[] = [];

    for (const phrase of phrases) {
        const texts = wildcardTokens(phrase.tks, position, count).map((token) => token.tt);
        if (phrase.sc > scoreThreshold && texts.every((text) => dictionary.has(text))) {
            candidates.push({ text: texts.join(' '), weight: phrase.mc });
        }
    }

    return candidates;
}
