import pino from 'pino';
import type { LogLevel } from '../types/index.js';

export interface LoggerOptions {
    level?: LogLevel;
    /** Raw JSON lines instead of pino-pretty output */
    jsonLogs?: boolean;
}

let loggerInstance: pino.Logger | null = null;

/**
 * Replace the shared logger. `tdbcore` calls this once its configuration is
 * resolved; library code never does.
 */
export function initLogger(options: LoggerOptions): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Shared logger for parser, resolver, store and archive diagnostics.
 * Falls back to pretty info-level output until `initLogger` runs.
 * Look it up at each call site so a later `initLogger` takes effect.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return loggerInstance;
}
