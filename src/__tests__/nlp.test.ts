import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadDictionary, parseWordList, WordSetDictionary } from '../nlp/dictionary.js';
import { NounLemmatizer } from '../nlp/lemmatizer.js';
import { createStopwordSet, loadWordArray, STOPWORDS } from '../nlp/stopwords.js';
import { loadLexicalResources } from '../nlp/resources.js';
import { runWithInput } from '../pipeline/guess.js';
import { FakeLookup, phrase } from './fixtures.js';

describe('Dictionary', () => {
    let dir: string;
    let wordFile: string;

    beforeAll(() => {
        dir = mkdtempSync(join(tmpdir(), 'phrasefill-dict-'));
        wordFile = join(dir, 'words.txt');
        writeFileSync(wordFile, 'apple\r\nbanana\n\n cherry \n', 'utf-8');
    });

    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe('parseWordList', () => {
        it('should split lines and skip blanks', () => {
            expect(parseWordList('apple\r\nbanana\n\n cherry \n')).toEqual(['apple', 'banana', 'cherry']);
        });

        it('should handle empty input', () => {
            expect(parseWordList('')).toEqual([]);
        });
    });

    describe('WordSetDictionary', () => {
        const dictionary = new WordSetDictionary(['fox', 'dog', 'fox']);

        it('should count distinct words', () => {
            expect(dictionary.size).toBe(2);
        });

        it('should match exactly', () => {
            expect(dictionary.has('fox')).toBe(true);
            expect(dictionary.has('Fox')).toBe(false);
            expect(dictionary.has('foxes')).toBe(false);
        });

        it('should never contain the empty string', () => {
            expect(new WordSetDictionary(['']).has('')).toBe(false);
        });
    });

    describe('loadDictionary', () => {
        it('should load a word file', () => {
            const dictionary = loadDictionary(wordFile);
            expect(dictionary.size).toBe(3);
            expect(dictionary.has('cherry')).toBe(true);
            expect(dictionary.has('durian')).toBe(false);
        });

        it('should load the bundled English list by default', () => {
            const dictionary = loadDictionary();
            expect(dictionary.size).toBeGreaterThan(1000);
            expect(dictionary.has('house')).toBe(true);
        });

        it('should include one-letter words in the bundled list', () => {
            const dictionary = loadDictionary();
            expect(dictionary.has('a')).toBe(true);
            expect(dictionary.has('I')).toBe(true);
            expect(dictionary.has('i')).toBe(true);
        });

        it('should not add one-letter words to a custom list', () => {
            expect(loadDictionary(wordFile).has('a')).toBe(false);
        });
    });

    describe('loadLexicalResources', () => {
        it('should wire the configured dictionary and extra stopwords', () => {
            const resources = loadLexicalResources({ dictionaryPath: wordFile, extraStopwords: ['banana'] });
            expect(resources.dictionary.size).toBe(3);
            expect(resources.stopwords.has('banana')).toBe(true);
            expect(resources.stopwords.has('the')).toBe(true);
            expect(resources.lemmatizer.lemmatize('apples')).toBe('apple');
        });

        it('should keep "a" as a guess with the default resources', async () => {
            const lookup = new FakeLookup({
                status: 'ok',
                phrases: [phrase(['a', 'cat'], 0.5, 60), phrase(['the', 'cat'], 0.4, 40)],
            });

            const scored = await runWithInput('cat', { lookup, resources: loadLexicalResources({ extraStopwords: [] }) });

            expect(scored).toEqual([
                { text: 'a', percentage: 60 },
                { text: 'the', percentage: 40 },
            ]);
        });
    });
});

describe('Lemmatizer', () => {
    const lemmatizer = new NounLemmatizer();

    it('should singularize plural nouns', () => {
        expect(lemmatizer.lemmatize('foxes')).toBe('fox');
        expect(lemmatizer.lemmatize('dogs')).toBe('dog');
    });

    it('should leave singular nouns alone', () => {
        expect(lemmatizer.lemmatize('house')).toBe('house');
    });

    it('should return blank input unchanged', () => {
        expect(lemmatizer.lemmatize('')).toBe('');
        expect(lemmatizer.lemmatize('  ')).toBe('  ');
    });
});

describe('Stopwords', () => {
    it('should contain common function words', () => {
        expect(STOPWORDS.has('the')).toBe(true);
        expect(STOPWORDS.has('of')).toBe(true);
    });

    it('should contain the classic English list', () => {
        for (const word of ['nor', 'against', 'once', 'few', 'own', 'further', 'whom', 'just', 'don', 's', 't', "don't"]) {
            expect(STOPWORDS.has(word)).toBe(true);
        }
    });

    it('should read a JSON word array', () => {
        const file = join(tmpdir(), `phrasefill-words-${process.pid}.json`);
        writeFileSync(file, '["x", "y"]', 'utf-8');
        try {
            expect(loadWordArray(file)).toEqual(['x', 'y']);
            writeFileSync(file, '{"x": 1}', 'utf-8');
            expect(() => loadWordArray(file)).toThrow('expected a JSON array of strings');
        } finally {
            rmSync(file, { force: true });
        }
    });

    it('should not contain content words', () => {
        expect(STOPWORDS.has('fox')).toBe(false);
        expect(STOPWORDS.has('brown fox')).toBe(false);
    });

    it('should return the shared set when there are no extras', () => {
        expect(createStopwordSet()).toBe(STOPWORDS);
    });

    it('should add extra words without changing the shared set', () => {
        const extended = createStopwordSet(['fox']);
        expect(extended.has('fox')).toBe(true);
        expect(extended.has('the')).toBe(true);
        expect(STOPWORDS.has('fox')).toBe(false);
    });
});
