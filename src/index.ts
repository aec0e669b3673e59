export * from './types/index.js';
export { buildPattern, buildQueryString, encodePattern, WILDCARD } from './query/query-builder.js';
export {
    PhraseFinderClient,
    MalformedResponseError,
    parseSearchResponse,
    PHRASEFINDER_ENDPOINT,
    type LookupResult,
    type PhraseLookup,
} from './sources/phrasefinder.js';
export { collectCandidates, wildcardTokens, DEFAULT_SCORE_THRESHOLD } from './pipeline/clean.js';
export { lemmatizeAndSum } from './pipeline/aggregate.js';
export { toPercentages } from './pipeline/score.js';
export { addStopwordFlags } from './pipeline/annotate.js';
export {
    scoreCandidates,
    guessCandidates,
    runWithInput,
    createGuessDependencies,
    type GuessDependencies,
    type GuessOutcome,
} from './pipeline/guess.js';
export { WordSetDictionary, loadDictionary, parseWordList, ONE_LETTER_WORDS } from './nlp/dictionary.js';
export { NounLemmatizer, createLemmatizer } from './nlp/lemmatizer.js';
export { STOPWORDS, createStopwordSet, loadWordArray } from './nlp/stopwords.js';
export { loadLexicalResources } from './nlp/resources.js';
export { HttpClient, HttpError, createHttpClient } from './utils/http-client.js';
export { resolveConfig, ConfigError } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export { VERSION } from './version.js';
