/**
 * Logger - Structured stderr logging for the room generator
 *
 * - Log levels (debug, info, warn, error, silent)
 * - Level from ROOMGEN_LOG_LEVEL (see config.ts); NODE_ENV=test defaults to silent
 * - Module prefixes for filtering, nested with child()
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const log = createLogger('Placement');
 *
 *   log.debug('Detailed info');  // Only shown when ROOMGEN_LOG_LEVEL=debug
 *   log.warn('Potential issue');
 */

import { loadConfig, LogLevel } from '../config.js';

export type { LogLevel } from '../config.js';

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;

    /** Create a child logger with additional prefix */
    child(prefix: string): Logger;

    isEnabled(level: LogLevel): boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOG LEVEL
// ═══════════════════════════════════════════════════════════════════════════

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4
};

let configuredLevel: LogLevel | null = null;

function getLevel(): LogLevel {
    if (configuredLevel === null) {
        configuredLevel = loadConfig().logLevel;
    }
    return configuredLevel;
}

/**
 * Drop the cached level so the next log call re-reads the environment
 */
export function resetLogLevel(): void {
    configuredLevel = null;
}

export function setLogLevel(level: LogLevel): void {
    configuredLevel = level;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

type MessageLevel = Exclude<LogLevel, 'silent'>;

class StderrLogger implements Logger {
    constructor(private readonly prefix: string) {}

    isEnabled(level: LogLevel): boolean {
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getLevel()];
    }

    private write(level: MessageLevel, message: string, args: unknown[]): void {
        if (!this.isEnabled(level)) return;
        const timestamp = new Date().toISOString().slice(11, 23); // HH:mm:ss.SSS
        const levelTag = level.toUpperCase().padEnd(5);
        console.error(`[${timestamp}] [${levelTag}] [${this.prefix}] ${message}`, ...args);
    }

    debug(message: string, ...args: unknown[]): void {
        this.write('debug', message, args);
    }

    info(message: string, ...args: unknown[]): void {
        this.write('info', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.write('warn', message, args);
    }

    error(message: string, ...args: unknown[]): void {
        this.write('error', message, args);
    }

    child(prefix: string): Logger {
        return new StderrLogger(`${this.prefix}:${prefix}`);
    }
}

/**
 * @example
 * const log = createLogger('Cleanup');
 * log.info('Removed 3 monsters');
 * // Output: [12:34:56.789] [INFO ] [Cleanup] Removed 3 monsters
 */
export function createLogger(prefix: string): Logger {
    return new StderrLogger(prefix);
}

// ═══════════════════════════════════════════════════════════════════════════
// ERROR FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    return String(error);
}

/**
 * Log an error, with its stack trace when debug is enabled
 */
export function logError(logger: Logger, message: string, error: unknown): void {
    logger.error(`${message}: ${getErrorMessage(error)}`);

    if (error instanceof Error && error.stack && logger.isEnabled('debug')) {
        logger.debug(`Stack trace:\n${error.stack}`);
    }
}
