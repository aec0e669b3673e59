import nlp from 'compromise';
import type { Lemmatizer } from '../types/index.js';

/**
 * Noun lemmatizer backed by compromise.
 *
 * The whole text is treated as one unit: plural nouns anywhere in it are
 * singularized and everything else is left as it was, so "brown foxes"
 * becomes "brown fox" and "running" stays "running".
 */
export class NounLemmatizer implements Lemmatizer {
    lemmatize(text: string): string {
        if (!text.trim()) return text;

        const doc = nlp(text);
        doc.nouns().toSingular();
        return doc.text();
    }
}

export function createLemmatizer(): Lemmatizer {
    return new NounLemmatizer();
}
