import type { Candidate, ScoredCandidate } from '../types/index.js';

/**
 * Convert weights into percentages of the total weight.
 *
 * An empty list gives an empty list. When the weights sum to zero every
 * candidate gets 0 rather than a division by zero.
 */
export function toPercentages(candidates: readonly Candidate[]): ScoredCandidate[] {
    const total = candidates.reduce((sum, c) => sum + c.weight, 0);

    return candidates.map(({ text, weight }) => ({
        text,
        percentage: total === 0 ? 0 : (weight / total) * 100,
    }));
}
