import type { AnnotatedCandidate } from '../types/index.js';
import type { HttpError } from '../utils/http-client.js';

/**
 * "  <text> <percentage>%" with two decimals, plus " STOPWORD" for stopwords.
 */
export function formatResultLine(candidate: AnnotatedCandidate): string {
    const suffix = candidate.isNotStopword ? '' : ' STOPWORD';
    return `  ${candidate.text} ${candidate.percentage.toFixed(2)}%${suffix}`;
}

export function formatResults(candidates: readonly AnnotatedCandidate[]): string {
    return candidates.map(formatResultLine).join('\n');
}

export function formatLookupFailure(error: HttpError): string {
    return `Lookup failed: ${error.message}`;
}
