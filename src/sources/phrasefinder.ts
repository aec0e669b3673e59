import type { PhraseRecord, PhraseToken } from '../types/index.js';
import { HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export const PHRASEFINDER_ENDPOINT = 'https://api.phrasefinder.io/search';

/**
 * Outcome of one lookup. A failed lookup is kept apart from an empty result.
 */
export type LookupResult =
    | { status: 'ok'; phrases: PhraseRecord[] }
    | { status: 'failed'; error: HttpError };

/**
 * Anything that can answer a phrase search query string.
 */
export interface PhraseLookup {
    lookup(queryString: string): Promise<LookupResult>;
}

/**
 * The response decoded, but its shape is not a PhraseFinder search result.
 */
export class MalformedResponseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedResponseError';
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseToken(raw: unknown, path: string): PhraseToken {
    const text = isRecord(raw) ? raw['tt'] : undefined;
    if (!isRecord(raw) || typeof text !== 'string') {
        throw new MalformedResponseError(`${path}: token without a "tt" string`);
    }
    return { ...raw, tt: text };
}

function parsePhrase(raw: unknown, index: number): PhraseRecord {
    const path = `phrases[${index}]`;
    if (!isRecord(raw)) {
        throw new MalformedResponseError(`${path}: expected an object`);
    }

    const { tks, sc, mc } = raw;
    if (!Array.isArray(tks)) {
        throw new MalformedResponseError(`${path}: "tks" is not an array`);
    }
    if (typeof sc !== 'number' || typeof mc !== 'number') {
        throw new MalformedResponseError(`${path}: "sc" and "mc" must be numbers`);
    }

    return {
        tks: tks.map((token, i) => parseToken(token, `${path}.tks[${i}]`)),
        sc,
        mc,
    };
}

/**
 * Pull the phrase records out of a decoded search response.
 * Throws `MalformedResponseError` when `phrases` is missing or a record is malformed.
 */
export function parseSearchResponse(body: unknown): PhraseRecord[] {
    const phrases = isRecord(body) ? body['phrases'] : undefined;
    if (!Array.isArray(phrases)) {
        throw new MalformedResponseError('Response has no "phrases" array');
    }
    return phrases.map((phrase, index) => parsePhrase(phrase, index));
}

/**
 * PhraseFinder search client.
 * Makes one request per lookup. Transport and decoding failures come back as a
 * `failed` result; a well-formed JSON body of the wrong shape throws.
 *
 * @see https://phrasefinder.io/api
 */
export class PhraseFinderClient implements PhraseLookup {
    constructor(
        private readonly httpClient: HttpClient,
        private readonly endpoint: string = PHRASEFINDER_ENDPOINT
    ) {}

    async lookup(queryString: string): Promise<LookupResult> {
        const url = `${this.endpoint}?${queryString}`;

        let data: unknown;
        try {
            const response = await this.httpClient.getJson(url);
            data = response.data;
        } catch (error) {
            if (!(error instanceof HttpError)) throw error;
            getLogger().error({ url, status: error.status, err: error }, error.message);
            return { status: 'failed', error };
        }

        const phrases = parseSearchResponse(data);
        getLogger().debug({ url, count: phrases.length }, 'PhraseFinder search');
        return { status: 'ok', phrases };
    }
}
