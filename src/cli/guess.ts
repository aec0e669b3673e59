import type { AnnotatedCandidate, Position } from '../types/index.js';
import { guessCandidates, type GuessDependencies } from '../pipeline/guess.js';
import { formatLookupFailure, formatResults } from './format.js';
import type { Output } from './prompts.js';

/**
 * Options of the `guess` command.
 */
export interface GuessCommandOptions {
    position: Position;
    count: number;
    /** Show at most this many candidates */
    limit?: number;
    json: boolean;
}

/**
 * Run the full pipeline for one word and print the result as text lines or JSON.
 * Returns the candidates that were printed.
 */
export async function runGuess(
    word: string,
    options: GuessCommandOptions,
    deps: GuessDependencies,
    out: Output
): Promise<AnnotatedCandidate[]> {
    const { lookup, candidates } = await guessCandidates(
        { word, position: options.position, wildcards: options.count },
        deps
    );
    if (lookup.status === 'failed') {
        out.printError(formatLookupFailure(lookup.error));
    }

    const shown = options.limit !== undefined ? candidates.slice(0, options.limit) : candidates;
    out.print(options.json ? JSON.stringify(shown, null, 2) : formatResults(shown));
    return shown;
}
