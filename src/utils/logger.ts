import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Writes structured JSON to a log file, or human-readable lines to stderr.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    file?: string;
}): pino.Logger {
    const { level = 'debug', file = 'debug.log' } = options;

    if (file !== '-') {
        loggerInstance = pino({ level }, pino.destination({ dest: file, mkdir: true, sync: true }));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, returns a warn-level logger on stderr.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = pino({ level: 'warn' }, pino.destination(2));
    }
    return loggerInstance;
}
