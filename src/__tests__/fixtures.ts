import type { LexicalResources, PhraseRecord } from '../types/index.js';
import type { LookupResult, PhraseLookup } from '../sources/phrasefinder.js';
import { WordSetDictionary } from '../nlp/dictionary.js';
import { createStopwordSet } from '../nlp/stopwords.js';
import type { Output } from '../cli/prompts.js';

/**
 * Build a phrase record from token texts.
 */
export function phrase(texts: string[], sc: number, mc: number): PhraseRecord {
    return { tks: texts.map((tt) => ({ tt })), sc, mc };
}

/**
 * Lexical resources with a small word list and a lookup-table lemmatizer.
 */
export function fakeResources(words: string[], lemmas: Record<string, string> = {}): LexicalResources {
    return {
        dictionary: new WordSetDictionary(words),
        lemmatizer: { lemmatize: (text) => lemmas[text] ?? text },
        stopwords: createStopwordSet(),
    };
}

/**
 * Lookup that records the query strings it receives and answers with a fixed result.
 */
export class FakeLookup implements PhraseLookup {
    readonly queries: string[] = [];

    constructor(private readonly result: LookupResult) {}

    async lookup(queryString: string): Promise<LookupResult> {
        this.queries.push(queryString);
        return this.result;
    }
}

/**
 * Output that keeps the lines it is given.
 */
export class RecordingOutput implements Output {
    readonly printed: string[] = [];
    readonly errors: string[] = [];

    print(line: string): void {
        this.printed.push(line);
    }

    printError(line: string): void {
        this.errors.push(line);
    }
}
