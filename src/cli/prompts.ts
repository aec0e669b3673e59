import { createInterface } from 'node:readline/promises';
import type { Position } from '../types/index.js';

/**
 * Where a run writes its results and notices.
 */
export interface Output {
    print(line: string): void;
    printError(line: string): void;
}

/**
 * Console I/O used by the interactive run.
 */
export interface Prompter extends Output {
    ask(question: string): Promise<string>;
    close(): void;
}

/**
 * Output on stdout/stderr.
 */
export const consoleOutput: Output = {
    print: (line) => console.log(line),
    printError: (line) => console.error(line),
};

/**
 * Bad user input that ends the run.
 */
export class InvalidInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidInputError';
    }
}

export const WORD_PROMPT = 'Please input word: ';
export const POSITION_PROMPT = 'Type B for before word, or A for after: ';
export const POSITION_RETRY = 'Invalid character, please try again: ';
export const COUNT_PROMPT = 'How many words in brackets: ';

/**
 * Prompter on stdin/stdout.
 */
export function createConsolePrompter(): Prompter {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    return {
        ask: (question) => rl.question(question),
        ...consoleOutput,
        close: () => rl.close(),
    };
}

export async function askWord(prompter: Prompter): Promise<string> {
    return prompter.ask(WORD_PROMPT);
}

/**
 * Ask for B or A (any case) until one is given.
 */
export async function askPosition(prompter: Prompter): Promise<Position> {
    for (;;) {
        const answer = (await prompter.ask(POSITION_PROMPT)).toLowerCase();
        if (answer === 'b') return 'before';
        if (answer === 'a') return 'after';
        prompter.print(POSITION_RETRY);
    }
}

/**
 * Parse a whole number, allowing surrounding whitespace and a sign.
 */
export function parseCount(input: string): number {
    if (!/^\s*[+-]?\d+\s*$/.test(input)) {
        throw new InvalidInputError(`Not a whole number: "${input}"`);
    }
    return parseInt(input, 10);
}

export async function askCount(prompter: Prompter): Promise<number> {
    return parseCount(await prompter.ask(COUNT_PROMPT));
}
