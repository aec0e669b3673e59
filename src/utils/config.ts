import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, LOG_LEVELS, type LogLevel, type PhraseFillConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Raised when a config value has the wrong type or range.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the known keys out of a parsed config file, checking each type.
 * Unknown keys are ignored.
 */
export function parseConfigObject(raw: unknown, origin: string): Partial<PhraseFillConfig> {
    if (!isRecord(raw)) {
        throw new ConfigError(`${origin}: expected an object`);
    }

    const config: Partial<PhraseFillConfig> = {};

    for (const key of ['endpoint', 'corpus', 'logFile', 'dictionaryPath'] as const) {
        const value = raw[key];
        if (value === undefined) continue;
        if (typeof value !== 'string' || value.length === 0) {
            throw new ConfigError(`${origin}: "${key}" must be a non-empty string`);
        }
        config[key] = value;
    }

    if (raw['scoreThreshold'] !== undefined) {
        const value = raw['scoreThreshold'];
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            throw new ConfigError(`${origin}: "scoreThreshold" must be a number`);
        }
        config.scoreThreshold = value;
    }

    if (raw['timeoutMs'] !== undefined) {
        const value = raw['timeoutMs'];
        if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
            throw new ConfigError(`${origin}: "timeoutMs" must be a positive integer`);
        }
        config.timeoutMs = value;
    }

    if (raw['logLevel'] !== undefined) {
        const value = raw['logLevel'];
        if (!isLogLevel(value)) {
            throw new ConfigError(`${origin}: "logLevel" must be one of ${LOG_LEVELS.join(', ')}`);
        }
        config.logLevel = value;
    }

    if (raw['extraStopwords'] !== undefined) {
        const value = raw['extraStopwords'];
        if (!Array.isArray(value) || !value.every((w): w is string => typeof w === 'string')) {
            throw new ConfigError(`${origin}: "extraStopwords" must be an array of strings`);
        }
        config.extraStopwords = value;
    }

    return config;
}

/**
 * Load configuration from phrasefill.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<PhraseFillConfig> | null> {
    const explorer = cosmiconfig('phrasefill', {
        searchPlaces: ['phrasefill.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (result && !result.isEmpty) {
        getLogger().debug({ path: result.filepath }, 'Loaded config file');
        return parseConfigObject(result.config, result.filepath);
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<PhraseFillConfig> {
    const config: Partial<PhraseFillConfig> = {};

    const endpoint = env['PHRASEFILL_ENDPOINT'];
    if (endpoint) config.endpoint = endpoint;

    const corpus = env['PHRASEFILL_CORPUS'];
    if (corpus) config.corpus = corpus;

    const logLevel = env['PHRASEFILL_LOG_LEVEL'];
    if (logLevel) {
        if (!isLogLevel(logLevel)) {
            throw new ConfigError(`PHRASEFILL_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
        }
        config.logLevel = logLevel;
    }

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<PhraseFillConfig>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<PhraseFillConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...withoutUndefined(cliFlags),
    };
}

/**
 * Drop keys whose value is undefined so they do not mask lower-precedence sources.
 */
function withoutUndefined(values: Partial<PhraseFillConfig>): Partial<PhraseFillConfig> {
    return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}
