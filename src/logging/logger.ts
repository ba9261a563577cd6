/**
 * @file Console Logger
 *
 * Scoped, level-filtered logging over `console`. Headless output is
 * colored with chalk the same way the presenter styles messages:
 * warnings yellow, errors red, debug chatter dimmed.
 *
 * Detail lines are printed beneath their message as indented sub-entries,
 * so one logical event (e.g. a YAML error with its location and payload)
 * stays together in the output.
 *
 * @module logging/logger
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logging sink injected into the loader.
 */
export interface Logger {
    debug(message: string, ...details: string[]): void;
    info(message: string, ...details: string[]): void;
    warn(message: string, ...details: string[]): void;
    error(message: string, ...details: string[]): void;
}

/**
 * Narrow an arbitrary string to a log level.
 */
export function logLevel_parse(raw: string | undefined): LogLevel | null {
    if (!raw) return null;
    const normalized: string = raw.trim().toLowerCase();
    const match: LogLevel | undefined = LOG_LEVELS.find((level: LogLevel): boolean => level === normalized);
    return match ?? null;
}

function level_style(level: LogLevel, text: string): string {
    switch (level) {
        case 'debug': return chalk.gray(text);
        case 'info':  return chalk.white(text);
        case 'warn':  return chalk.yellow(text);
        case 'error': return chalk.red(text);
    }
}

/**
 * Logger writing to the console with a `[scope]` prefix.
 */
export class ConsoleLogger implements Logger {
    constructor(
        private readonly scope: string,
        private readonly minLevel: LogLevel = 'info'
    ) {}

    debug(message: string, ...details: string[]): void {
        this.entry_write('debug', message, details);
    }

    info(message: string, ...details: string[]): void {
        this.entry_write('info', message, details);
    }

    warn(message: string, ...details: string[]): void {
        this.entry_write('warn', message, details);
    }

    error(message: string, ...details: string[]): void {
        this.entry_write('error', message, details);
    }

    /**
     * Derive a logger for a sub-component, e.g. `netinstall:fetch`.
     */
    child(scope: string): ConsoleLogger {
        return new ConsoleLogger(`${this.scope}:${scope}`, this.minLevel);
    }

    private entry_write(level: LogLevel, message: string, details: string[]): void {
        if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) return;

        const lines: string[] = [`[${this.scope}] ${message}`];
        for (const detail of details) {
            lines.push(`    .. ${detail}`);
        }
        const text: string = level_style(level, lines.join('\n'));

        switch (level) {
            case 'error': console.error(text); break;
            case 'warn':  console.warn(text); break;
            default:      console.log(text); break;
        }
    }
}

export interface LogEntry {
    level: LogLevel;
    message: string;
    details: string[];
}

/**
 * Logger that keeps entries in memory, for hosts that show them later.
 */
export class MemoryLogger implements Logger {
    readonly entries: LogEntry[] = [];

    debug(message: string, ...details: string[]): void {
        this.entries.push({ level: 'debug', message, details });
    }

    info(message: string, ...details: string[]): void {
        this.entries.push({ level: 'info', message, details });
    }

    warn(message: string, ...details: string[]): void {
        this.entries.push({ level: 'warn', message, details });
    }

    error(message: string, ...details: string[]): void {
        this.entries.push({ level: 'error', message, details });
    }

    messages_get(level: LogLevel): string[] {
        return this.entries
            .filter((entry: LogEntry): boolean => entry.level === level)
            .map((entry: LogEntry): string => entry.message);
    }
}
