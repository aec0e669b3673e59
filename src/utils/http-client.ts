import { VERSION } from '../version.js';
import { getLogger } from './logger.js';

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    /** Abort after this many milliseconds; no limit when omitted */
    timeout?: number;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
}

/**
 * HTTP error. Status 0 means the request never got a response.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Thin JSON-over-HTTP client. One attempt per call, no retries.
 */
export class HttpClient {
    private readonly defaultTimeout: number | undefined;
    private readonly userAgent: string;

    constructor(options?: { timeout?: number }) {
        this.defaultTimeout = options?.timeout;
        this.userAgent = `phrasefill/${VERSION}`;
    }

    /**
     * GET a URL and decode the body as JSON.
     * Non-2xx statuses, transport errors, timeouts and undecodable bodies all raise `HttpError`.
     */
    async getJson(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<unknown>> {
        const { headers = {}, timeout = this.defaultTimeout } = options;

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            Accept: 'application/json',
            ...headers,
        };

        const controller = new AbortController();
        const timeoutId = timeout !== undefined ? setTimeout(() => controller.abort(), timeout) : undefined;

        let response: Response;
        let body: string;
        try {
            getLogger().debug({ url }, 'HTTP GET');
            response = await fetch(url, {
                method: 'GET',
                headers: requestHeaders,
                signal: controller.signal,
            });
            body = await response.text();
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0);
            }
            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0
            );
        } finally {
            clearTimeout(timeoutId);
        }

        if (!response.ok) {
            throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, body);
        }

        let data: unknown;
        try {
            data = JSON.parse(body);
        } catch (error) {
            throw new HttpError(
                `Invalid JSON response: ${error instanceof Error ? error.message : String(error)}`,
                response.status,
                body
            );
        }

        const responseHeaders: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            responseHeaders[key] = value;
        });

        return { status: response.status, headers: responseHeaders, data };
    }
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: { timeout?: number }): HttpClient {
    return new HttpClient(options);
}
