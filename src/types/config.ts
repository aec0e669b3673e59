/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface PhraseFillConfig {
    // Remote lookup
    endpoint: string;
    corpus: string;
    timeoutMs?: number;

    // Cleaning
    scoreThreshold: number;

    // Lexical resources
    dictionaryPath?: string;
    extraStopwords: string[];

    // Logging
    logLevel: LogLevel;
    /** Log file path; `-` logs pretty output to stderr */
    logFile: string;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PhraseFillConfig = {
    endpoint: 'https://api.phrasefinder.io/search',
    corpus: 'eng-gb',
    scoreThreshold: 0.001,
    extraStopwords: [],
    logLevel: 'debug',
    logFile: 'debug.log',
};
