/**
 * Leveled logger writing to stderr, so reports on stdout stay clean
 */
import chalk from 'chalk';
import type { LogLevel } from '../types/index.js';

export interface Logger {
    error(message: string, context?: object): void;
    warn(message: string, context?: object): void;
    info(message: string, context?: object): void;
    debug(message: string, context?: object): void;
}

export interface LoggerOptions {
    level?: LogLevel;
    /** Receives each formatted line; defaults to console.error */
    sink?: (line: string) => void;
    color?: boolean;
    scope?: string;
}

const SEVERITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

type Level = Exclude<LogLevel, 'silent'>;

export function createLogger(options: LoggerOptions = {}): Logger {
    const threshold = SEVERITY[options.level ?? 'info'];
    const sink = options.sink ?? ((line: string) => console.error(line));
    const scope = options.scope ?? 'slg';
    const paint = new chalk.Instance({ level: options.color === false ? 0 : chalk.level });

    const styles: Record<Level, (s: string) => string> = {
        error: paint.red.bold,
        warn: paint.yellow,
        info: paint.cyan,
        debug: paint.gray,
    };

    const emit = (level: Level, message: string, context?: object) => {
        if (SEVERITY[level] > threshold) return;
        const suffix = context && Object.keys(context).length > 0
            ? ' ' + paint.dim(JSON.stringify(context))
            : '';
        sink(`${paint.dim(`[${scope}]`)} ${styles[level](level)} ${message}${suffix}`);
    };

    return {
        error: (message, context) => emit('error', message, context),
        warn: (message, context) => emit('warn', message, context),
        info: (message, context) => emit('info', message, context),
        debug: (message, context) => emit('debug', message, context),
    };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
