/**
 * Barrel export for all shared types.
 */
export type {
    Position,
    PhraseToken,
    PhraseRecord,
    Candidate,
    ScoredCandidate,
    AnnotatedCandidate,
    GuessRequest,
} from './phrase.js';
export { DEFAULT_CONFIG, LOG_LEVELS } from './config.js';
export type { PhraseFillConfig, LogLevel } from './config.js';
export type { WordDictionary, Lemmatizer, StopwordSet, LexicalResources } from './resources.js';
