import type { AnnotatedCandidate, ScoredCandidate, StopwordSet } from '../types/index.js';

/**
 * Flag each candidate: `isNotStopword` is false when the whole text is a stopword.
 */
export function addStopwordFlags(
    scored: readonly ScoredCandidate[],
    stopwords: StopwordSet
): AnnotatedCandidate[] {
    return scored.map((candidate) => ({
        ...candidate,
        isNotStopword: !stopwords.has(candidate.text),
    }));
}
