/**
 * Which side of the anchor word the blank sits on.
 */
export type Position = 'before' | 'after';

/**
 * One token of a phrase returned by PhraseFinder.
 * Only the token text is read; the service sends other fields too.
 */
export interface PhraseToken {
    tt: string;
    [field: string]: unknown;
}

/**
 * A phrase record from the PhraseFinder search response.
 */
export interface PhraseRecord {
    /** Tokens in phrase order, anchor included */
    tks: PhraseToken[];
    /** Relevance score */
    sc: number;
    /** Match count in the corpus */
    mc: number;
}

/**
 * Candidate fill text with its weight.
 * The weight is the raw match count after cleaning and the summed count after aggregation.
 */
export interface Candidate {
    text: string;
    weight: number;
}

/**
 * Candidate with its share of the total weight, in percent.
 */
export interface ScoredCandidate {
    text: string;
    percentage: number;
}

/**
 * Final output shape. `isNotStopword` is false when the text is a stopword.
 */
export interface AnnotatedCandidate extends ScoredCandidate {
    isNotStopword: boolean;
}

/**
 * Parameters of one guess.
 */
export interface GuessRequest {
    word: string;
    position: Position;
    wildcards: number;
}
