/**
 * Exact-string membership check against a dictionary word list.
 */
export interface WordDictionary {
    has(word: string): boolean;
    readonly size: number;
}

/**
 * Reduces text to its dictionary base form.
 */
export interface Lemmatizer {
    lemmatize(text: string): string;
}

/**
 * Set of common function words.
 */
export interface StopwordSet {
    has(word: string): boolean;
}

/**
 * Read-only linguistic services shared by the pipeline stages.
 * Built once at startup and passed in explicitly.
 */
export interface LexicalResources {
    dictionary: WordDictionary;
    lemmatizer: Lemmatizer;
    stopwords: StopwordSet;
}
