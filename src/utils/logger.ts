import pino from 'pino';
import type { LogLevel } from '../types/index.js';

export interface LoggerOptions {
    level?: LogLevel;
    /** One JSON object per line instead of pino-pretty output */
    jsonLogs?: boolean;
    /** Sink for JSON lines; stdout when omitted */
    destination?: pino.DestinationStream;
}

let current: pino.Logger | null = null;

function createLogger({ level = 'info', jsonLogs = false, destination }: LoggerOptions): pino.Logger {
    if (destination) {
        return pino({ level }, destination);
    }
    if (jsonLogs) {
        return pino({ level });
    }
    return pino({
        level,
        transport: {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' },
        },
    });
}

/**
 * Replace the process logger. The CLI calls this once the config is resolved.
 * Modules must look the logger up through `getLogger()` at the point they log,
 * never hold on to an earlier instance.
 */
export function initLogger(options: LoggerOptions): pino.Logger {
    current = createLogger(options);
    return current;
}

/**
 * The process logger; pretty output at info until `initLogger` runs.
 */
export function getLogger(): pino.Logger {
    if (!current) {
        current = createLogger({});
    }
    return current;
}
