/**
 * Logger - Structured logging for the archetype engine
 *
 * - Log levels (debug, info, warn, error)
 * - Level taken from TRAITS_LOG_LEVEL; unknown values fall back to the default
 * - Module prefixes for easy filtering
 * - Silent under NODE_ENV=test unless a level is set explicitly
 * - Writes to stderr so hosts keep stdout to themselves
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const log = createLogger('Archetypes');
 *
 *   log.debug('Loaded Warrior');
 */

import { LogLevelSchema } from '../config.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

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
// LOG LEVEL CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4
};

/**
 * TRAITS_LOG_LEVEL wins when it names a level; anything else is ignored here
 * (getConfig() is where a bad value gets reported).
 */
function getConfiguredLevel(): LogLevel {
    const envLevel = LogLevelSchema.safeParse(process.env.TRAITS_LOG_LEVEL?.toLowerCase());
    if (envLevel.success) {
        return envLevel.data;
    }

    if (process.env.NODE_ENV === 'test') {
        return 'silent';
    }

    return 'info';
}

let configuredLevel: LogLevel | null = null;

function getLevel(): LogLevel {
    if (configuredLevel === null) {
        configuredLevel = getConfiguredLevel();
    }
    return configuredLevel;
}

/**
 * Reset the cached level (useful for tests)
 */
export function resetLogLevel(): void {
    configuredLevel = null;
}

/**
 * Override the log level programmatically
 */
export function setLogLevel(level: LogLevel): void {
    configuredLevel = level;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

class StderrLogger implements Logger {
    constructor(private prefix: string) {}

    isEnabled(level: LogLevel): boolean {
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getLevel()];
    }

    private write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
        if (!this.isEnabled(level)) {
            return;
        }
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
 * Create a logger instance with the given module prefix
 *
 * @example
 * const log = createLogger('Archetypes');
 * log.warn('Unknown archetype');
 * // Output: [12:34:56.789] [WARN ] [Archetypes] Unknown archetype
 */
export function createLogger(prefix: string): Logger {
    return new StderrLogger(prefix);
}
