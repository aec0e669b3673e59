import type { Candidate, Lemmatizer } from '../types/index.js';

/**
 * Fold candidates into their lemma and sum the weights of each group.
 * Sorted by summed weight, highest first; equal weights keep first-seen order.
 */
export function lemmatizeAndSum(candidates: readonly Candidate[], lemmatizer: Lemmatizer): Candidate[] {
    const totals = new Map<string, number>();

    for (const { text, weight } of candidates) {
        const lemma = lemmatizer.lemmatize(text);
        totals.set(lemma, (totals.get(lemma) ?? 0) + weight);
    }

    return [...totals]
        .map(([text, weight]) => ({ text, weight }))
        .sort((a, b) => b.weight - a.weight);
}
