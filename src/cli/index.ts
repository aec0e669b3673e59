#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { createGuessDependencies } from '../pipeline/guess.js';
import { LOG_LEVELS, type LogLevel, type PhraseFillConfig } from '../types/index.js';
import { VERSION } from '../version.js';
import { consoleOutput, createConsolePrompter, parseCount } from './prompts.js';
import { runInteractive } from './interactive.js';
import { runGuess, type GuessCommandOptions } from './guess.js';

type GlobalOptions = {
    logLevel?: LogLevel;
    logFile?: string;
    corpus?: string;
    timeout?: number;
};

type GuessOptions = GlobalOptions & GuessCommandOptions;

function parsePositiveInt(value: string): number {
    const n = parseInt(value, 10);
    if (isNaN(n) || n <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return n;
}

function parseWildcards(value: string): number {
    try {
        return parseCount(value);
    } catch (error) {
        throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
}

/**
 * Resolve config from the global flags and start logging.
 */
async function setup(opts: GlobalOptions): Promise<PhraseFillConfig> {
    const cliConfig: Partial<PhraseFillConfig> = {
        logLevel: opts.logLevel,
        logFile: opts.logFile,
        corpus: opts.corpus,
        timeoutMs: opts.timeout,
    };

    const config = await resolveConfig(cliConfig);
    initLogger({ level: config.logLevel, file: config.logFile });
    return config;
}

function fail(label: string, error: unknown): never {
    getLogger().error({ err: error }, label);
    consoleOutput.printError(`${label}: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
}

const program = new Command();

program
    .name('phrasefill')
    .description('Guess the words that fill a blank before or after a known word.')
    .version(VERSION)
    .addOption(new Option('--log-level <level>', 'Log level').choices(LOG_LEVELS))
    .option('--log-file <path>', 'Log file path, or - for pretty logs on stderr')
    .option('--corpus <corpus>', 'PhraseFinder corpus, e.g. eng-gb or eng-us')
    .option('--timeout <ms>', 'Request timeout in milliseconds', parsePositiveInt);

// ─── ASK command ──────────────────────────────────────────

program
    .command('ask', { isDefault: true })
    .description('Prompt for a word, a side and a wildcard count, then print ranked guesses')
    .action(async (_opts: object, command: Command) => {
        let config: PhraseFillConfig;
        try {
            config = await setup(command.optsWithGlobals<GlobalOptions>());
        } catch (error) {
            fail('Configuration failed', error);
        }

        const prompter = createConsolePrompter();
        try {
            await runInteractive(prompter, createGuessDependencies(config));
        } catch (error) {
            fail('Guess failed', error);
        } finally {
            prompter.close();
        }
    });

// ─── GUESS command ────────────────────────────────────────

program
    .command('guess')
    .description('Print ranked guesses for a word without prompting')
    .argument('<word>', 'Anchor word')
    .addOption(new Option('-p, --position <position>', 'Side of the blank').choices(['before', 'after']).default('before'))
    .option('-n, --count <n>', 'Number of words in the blank', parseWildcards, 1)
    .option('-l, --limit <n>', 'Show at most this many guesses', parsePositiveInt)
    .option('--json', 'Print JSON instead of text', false)
    .action(async (word: string, _opts: object, command: Command) => {
        const opts = command.optsWithGlobals<GuessOptions>();

        try {
            const config = await setup(opts);
            await runGuess(word, opts, createGuessDependencies(config), consoleOutput);
        } catch (error) {
            fail('Guess failed', error);
        }
    });

await program.parseAsync();
