/**
 * Server Configuration
 *
 * Typed view over the environment, read once by the entry point after the
 * .env file is loaded. Bad values fail start-up.
 */

import { ConfigurationError } from '@src/lib/errors/configuration-error.js';
import { isLogLevel, normalizeLevel, type LogLevel } from '@src/lib/logger.js';

export interface ServerConfig {
    port: number;
    nodeEnv: string;
    logLevel: LogLevel;
}

export const DEFAULT_PORT = 8080;

export function readServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const portText = env.PORT?.trim() || String(DEFAULT_PORT);
    const port = Number(portText);
    if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
        throw new ConfigurationError(`'${portText}' is not a valid port`, 'PORT');
    }

    const logLevel = normalizeLevel(env.LOG_LEVEL);
    if (!isLogLevel(logLevel)) {
        throw new ConfigurationError(`'${logLevel}' is not a log level`, 'LOG_LEVEL');
    }

    return {
        port,
        nodeEnv: env.NODE_ENV?.trim() || 'development',
        logLevel,
    };
}
