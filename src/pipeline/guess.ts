import type {
    AnnotatedCandidate,
    GuessRequest,
    LexicalResources,
    PhraseFillConfig,
    ScoredCandidate,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { buildQueryString } from '../query/query-builder.js';
import { PhraseFinderClient, type LookupResult, type PhraseLookup } from '../sources/phrasefinder.js';
import { loadLexicalResources } from '../nlp/resources.js';
import { createHttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { collectCandidates, DEFAULT_SCORE_THRESHOLD } from './clean.js';
import { lemmatizeAndSum } from './aggregate.js';
import { toPercentages } from './score.js';
import { addStopwordFlags } from './annotate.js';

/**
 * Everything a guess needs besides its request.
 */
export interface GuessDependencies {
    lookup: PhraseLookup;
    resources: LexicalResources;
    corpus?: string;
    scoreThreshold?: number;
}

/**
 * Pipeline output together with how the lookup went, so callers can tell
 * "nothing matched" from "the service could not be reached".
 */
export interface GuessOutcome<T> {
    lookup: LookupResult;
    candidates: T[];
}

/**
 * Query, clean, lemmatize and score. No stopword flags.
 * A failed lookup yields no candidates.
 */
export async function scoreCandidates(
    request: GuessRequest,
    deps: GuessDependencies
): Promise<GuessOutcome<ScoredCandidate>> {
    const { word, position, wildcards } = request;
    const { resources, corpus = DEFAULT_CONFIG.corpus, scoreThreshold = DEFAULT_SCORE_THRESHOLD } = deps;
    const logger = getLogger();

    const queryString = buildQueryString(word, position, wildcards, corpus);
    const lookup = await deps.lookup.lookup(queryString);
    const phrases = lookup.status === 'ok' ? lookup.phrases : [];

    const cleaned = collectCandidates(phrases, position, wildcards, resources.dictionary, scoreThreshold);
    const summed = lemmatizeAndSum(cleaned, resources.lemmatizer);
    const scored = toPercentages(summed);

    logger.debug(
        { word, position, wildcards, phrases: phrases.length, kept: cleaned.length, lemmas: summed.length },
        'Candidates scored'
    );

    return { lookup, candidates: scored };
}

/**
 * Full pipeline: scored candidates flagged with whether each is a stopword.
 */
export async function guessCandidates(
    request: GuessRequest,
    deps: GuessDependencies
): Promise<GuessOutcome<AnnotatedCandidate>> {
    const { lookup, candidates } = await scoreCandidates(request, deps);
    return { lookup, candidates: addStopwordFlags(candidates, deps.resources.stopwords) };
}

/**
 * Guess the single word that most often comes right before `phrase`.
 * Returns the scored list without stopword flags.
 */
export async function runWithInput(phrase: string, deps: GuessDependencies): Promise<ScoredCandidate[]> {
    const { candidates } = await scoreCandidates({ word: phrase, position: 'before', wildcards: 1 }, deps);
    return candidates;
}

/**
 * Wire the real PhraseFinder client and lexical resources from config.
 */
export function createGuessDependencies(config: PhraseFillConfig): GuessDependencies {
    const httpClient = createHttpClient({ timeout: config.timeoutMs });
    return {
        lookup: new PhraseFinderClient(httpClient, config.endpoint),
        resources: loadLexicalResources(config),
        corpus: config.corpus,
        scoreThreshold: config.scoreThreshold,
    };
}
