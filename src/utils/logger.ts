import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Pretty-printed by default, raw JSON lines with `jsonLogs`. Logs go to
 * stderr; stdout carries only command output such as the `inspect` report.
 */
const STDERR_FD = 2;

let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger. Called once by the CLI before any command runs.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level }, pino.destination(STDERR_FD));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: STDERR_FD,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance, creating a default info-level one if needed.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return loggerInstance;
}
