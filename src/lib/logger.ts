/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting and a
 * LOG_LEVEL threshold (debug, info, warn, error, silent).
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Threshold from the environment, read on every call so tests and the
 * entry point can change it after modules load
 */
export function levelFromEnv(): LogLevel {
    const configured = normalizeLevel(process.env.LOG_LEVEL);
    return isLogLevel(configured) ? configured : 'info';
}

/**
 * Trimmed, lower-cased LOG_LEVEL text; empty or unset reads as `info`
 */
export function normalizeLevel(raw: string | undefined): string {
    return raw?.trim().toLowerCase() || 'info';
}

export class Logger {
    constructor(private readonly threshold: () => LogLevel = levelFromEnv) {}

    debug(message: string, meta?: LogMeta) {
        if (this.enabled('debug')) {
            console.debug(this.formatLog('DEBUG', message, meta));
        }
    }

    info(message: string, meta?: LogMeta) {
        if (this.enabled('info')) {
            console.info(this.formatLog('INFO', message, meta));
        }
    }

    warn(message: string, meta?: LogMeta) {
        if (this.enabled('warn')) {
            console.warn(this.formatLog('WARN', message, meta));
        }
    }

    error(message: string, meta?: LogMeta) {
        if (this.enabled('error')) {
            console.error(this.formatLog('ERROR', message, meta));
        }
    }

    private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.threshold()];
    }

    /**
     * Format log message with environment-aware output
     */
    private formatLog(level: string, message: string, meta?: LogMeta): string {
        if (process.env.NODE_ENV === 'production') {
            // Structured JSON for production log aggregation
            return JSON.stringify({
                timestamp: new Date().toISOString(),
                level,
                message,
                ...(meta && { meta }),
            });
        }

        // Pretty format for development
        const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
        return `${level} ${message}${metaStr}`;
    }
}

/**
 * Global logger instance shared by the pipeline, middleware and server
 */
export const logger = new Logger();
