/**
 * Logger - structured stderr logging for the wizard builder server.
 *
 * stdout belongs to the MCP stdio transport, so every line goes to stderr.
 *
 * Environment:
 *   WIZARD_LOG_LEVEL=debug|info|warn|error|silent (default: info)
 *   NODE_ENV=test defaults to silent
 *
 * Usage:
 *   const log = createLogger('Sheet');
 *   log.info('Saved sheet', { sessionId });
 *   log.child('Spells').debug('Resolved "firebll" to Fireball');
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;

    /** Logger whose prefix is `parent:prefix` */
    child(prefix: string): Logger;

    isEnabled(level: LogLevel): boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// LEVEL CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4
};

function levelFromEnvironment(): LogLevel {
    const parsed = LogLevelSchema.safeParse(process.env.WIZARD_LOG_LEVEL?.trim().toLowerCase());
    if (parsed.success) {
        return parsed.data;
    }
    return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

let activeLevel: LogLevel | null = null;

function currentLevel(): LogLevel {
    if (activeLevel === null) {
        activeLevel = levelFromEnvironment();
    }
    return activeLevel;
}

/** Forget any override so the next log call re-reads the environment. */
export function resetLogLevel(): void {
    activeLevel = null;
}

export function setLogLevel(level: LogLevel): void {
    activeLevel = level;
}

// ═══════════════════════════════════════════════════════════════════════════
// STDERR LOGGER
// ═══════════════════════════════════════════════════════════════════════════

type EmittingLevel = Exclude<LogLevel, 'silent'>;

class StderrLogger implements Logger {
    constructor(private readonly prefix: string) {}

    isEnabled(level: LogLevel): boolean {
        return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel()];
    }

    debug(message: string, ...args: unknown[]): void {
        this.emit('debug', message, args);
    }

    info(message: string, ...args: unknown[]): void {
        this.emit('info', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.emit('warn', message, args);
    }

    error(message: string, ...args: unknown[]): void {
        this.emit('error', message, args);
    }

    child(prefix: string): Logger {
        return new StderrLogger(`${this.prefix}:${prefix}`);
    }

    private emit(level: EmittingLevel, message: string, args: unknown[]): void {
        if (!this.isEnabled(level)) return;
        const clock = new Date().toISOString().slice(11, 23); // HH:mm:ss.SSS
        const tag = level.toUpperCase().padEnd(5);
        console.error(`[${clock}] [${tag}] [${this.prefix}] ${message}`, ...args);
    }
}

/**
 * @example
 * createLogger('Storage').info('Database ready');
 * // [12:34:56.789] [INFO ] [Storage] Database ready
 */
export function createLogger(prefix: string): Logger {
    return new StderrLogger(prefix);
}

/** Process-wide logger for startup and shutdown messages. */
export const logger = createLogger('wizard-builder');

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Measures elapsed time and reports it at debug level.
 *
 * @example
 * const timer = createTimer(log);
 * loadEverything();
 * timer.done('Loaded reference data'); // "Loaded reference data (3.21ms)"
 */
export function createTimer(log: Logger): { done: (message: string) => void } {
    const start = performance.now();
    return {
        done(message: string): void {
            log.debug(`${message} (${(performance.now() - start).toFixed(2)}ms)`);
        }
    };
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    return String(error);
}

/** Logs `message: reason`, plus the stack when debug output is on. */
export function logError(log: Logger, message: string, error: unknown): void {
    log.error(`${message}: ${getErrorMessage(error)}`);
    if (error instanceof Error && error.stack && log.isEnabled('debug')) {
        log.debug(`Stack trace:\n${error.stack}`);
    }
}
