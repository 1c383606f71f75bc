import pino from 'pino';
import type { LogLevel } from '../types/index.js';

export interface LoggerOptions {
    level?: LogLevel;
    /** Write newline-delimited JSON instead of pretty lines */
    jsonLogs?: boolean;
}

const NAME = 'catalog-explorer';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 *
 * Logs always go to stderr: stdout carries command output such as Turtle,
 * which has to stay parseable when piped.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger. Should be called once at CLI startup, before the
 * first request.
 */
export function initLogger(options: LoggerOptions): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ name: NAME, level }, pino.destination(2));
    } else {
        loggerInstance = pino({
            name: NAME,
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,name',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger. Under test runs it stays at
 * `warn` and writes JSON, so no transport worker is started.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = process.env['VITEST']
            ? pino({ name: NAME, level: 'warn' }, pino.destination(2))
            : initLogger({ level: 'info' });
    }
    return loggerInstance;
}
