import type { AnnotatedCandidate } from '../types/index.js';
import { guessCandidates, type GuessDependencies } from '../pipeline/guess.js';
import { formatLookupFailure, formatResults } from './format.js';
import { askCount, askPosition, askWord, type Prompter } from './prompts.js';

/**
 * Ask for the word, side and wildcard count, run the full pipeline and print
 * one line per candidate. Returns the flagged candidates.
 */
export async function runInteractive(prompter: Prompter, deps: GuessDependencies): Promise<AnnotatedCandidate[]> {
    const word = await askWord(prompter);
    const position = await askPosition(prompter);
    const wildcards = await askCount(prompter);

    const { lookup, candidates } = await guessCandidates({ word, position, wildcards }, deps);
    if (lookup.status === 'failed') {
        prompter.printError(formatLookupFailure(lookup.error));
    }

    prompter.print(formatResults(candidates));
    return candidates;
}
