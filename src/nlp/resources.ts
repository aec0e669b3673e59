import type { LexicalResources, PhraseFillConfig } from '../types/index.js';
import { loadDictionary } from './dictionary.js';
import { createLemmatizer } from './lemmatizer.js';
import { createStopwordSet } from './stopwords.js';

/**
 * Build the lexical services once at startup.
 */
export function loadLexicalResources(
    config: Pick<PhraseFillConfig, 'dictionaryPath' | 'extraStopwords'>
): LexicalResources {
    return {
        dictionary: loadDictionary(config.dictionaryPath),
        lemmatizer: createLemmatizer(),
        stopwords: createStopwordSet(config.extraStopwords),
    };
}
