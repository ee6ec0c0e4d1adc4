// Structured logger for CLI runs
// Writes to stderr so stdout stays reserved for command results

import { appendFileSync } from 'node:fs';
import dayjs from 'dayjs';
import type { LogLevel } from './config.js';

export type { LogLevel };
export type LogFormat = 'json' | 'pretty';

export interface LogContext {
    profile?: string;
    command?: string;
    service?: string;
    resourceId?: string;
    [key: string]: unknown;
}

export interface LoggerOptions {
    level?: LogLevel;
    format?: LogFormat;
    file?: string;
    write?: (line: string) => void;
}

const LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export class Logger {
    private level: LogLevel;
    private format: LogFormat;
    private file?: string;
    private write: (line: string) => void;
    private context: LogContext;

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? 'info';
        this.format = options.format ?? (process.stderr.isTTY ? 'pretty' : 'json');
        this.file = options.file;
        this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
        this.context = {};
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVELS[level] >= LEVELS[this.level];
    }

    private emit(level: LogLevel, message: string, extra?: LogContext): void {
        const timestamp = new Date();
        const fields = { ...this.context, ...extra };
        const entry = {
            timestamp: timestamp.toISOString(),
            level: level.toUpperCase(),
            message,
            ...fields,
        };

        if (this.format === 'json') {
            this.write(JSON.stringify(entry));
        } else {
            const suffix = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
            this.write(`${dayjs(timestamp).format('HH:mm:ss')} ${level.toUpperCase().padEnd(5)} ${message}${suffix}`);
        }

        if (this.file) {
            appendFileSync(this.file, `${JSON.stringify(entry)}\n`, 'utf8');
        }
    }

    configure(options: LoggerOptions): void {
        if (options.level) this.level = options.level;
        if (options.format) this.format = options.format;
        if (options.file) this.file = options.file;
        if (options.write) this.write = options.write;
    }

    setContext(context: LogContext): void {
        this.context = { ...this.context, ...context };
    }

    debug(message: string, extra?: LogContext): void {
        if (this.shouldLog('debug')) {
            this.emit('debug', message, extra);
        }
    }

    info(message: string, extra?: LogContext): void {
        if (this.shouldLog('info')) {
            this.emit('info', message, extra);
        }
    }

    warn(message: string, extra?: LogContext): void {
        if (this.shouldLog('warn')) {
            this.emit('warn', message, extra);
        }
    }

    error(message: string, error?: Error | unknown, extra?: LogContext): void {
        if (this.shouldLog('error')) {
            const errorDetails: LogContext = { ...extra };
            if (error instanceof Error) {
                errorDetails.errorName = error.name;
                errorDetails.errorMessage = error.message;
                if (this.level === 'debug') {
                    errorDetails.stack = error.stack;
                }
            } else if (error) {
                errorDetails.errorMessage = String(error);
            }
            this.emit('error', message, errorDetails);
        }
    }

    // Child shares level and sinks, adds context
    child(context: LogContext): Logger {
        const childLogger = new Logger({
            level: this.level,
            format: this.format,
            file: this.file,
            write: this.write,
        });
        childLogger.context = { ...this.context, ...context };
        return childLogger;
    }
}

/**
 * Level for a run: --verbose wins over --quiet, both win over LOG_LEVEL.
 */
export function resolveLogLevel(flags: { verbose?: boolean; quiet?: boolean }, fallback: LogLevel): LogLevel {
    if (flags.verbose) return 'debug';
    if (flags.quiet) return 'error';
    return fallback;
}

// Singleton logger instance, configured by the CLI entry point
export const logger = new Logger();

export default logger;
