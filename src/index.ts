/**
 * Fieldgate - Main Entry Point
 *
 * Orchestrates server startup:
 * - Environment loading and validation
 * - Validator construction (rules and groups are fixed from here on)
 * - HTTP server startup
 * - Graceful shutdown coordination
 */

import { loadEnv } from '@src/lib/env/load-env.js';

// Load environment-specific .env file
const envFile = process.env.NODE_ENV ? `.env.${process.env.NODE_ENV}` : '.env';
loadEnv({ path: envFile });

import { readServerConfig } from '@src/lib/config.js';
import { logger } from '@src/lib/logger.js';
import { Validator } from '@src/lib/validators/validator.js';
import { startHttpServer } from '@src/servers/http.js';

const config = readServerConfig();

logger.info('Starting request validation server', {
    nodeEnv: config.nodeEnv,
    port: config.port,
    logLevel: config.logLevel,
});

// Check for --no-startup flag
if (process.argv.includes('--no-startup')) {
    logger.info('Startup test successful - all modules loaded without errors');
    process.exit(0);
}

const validator = new Validator();
const httpServer = startHttpServer(config.port, validator);

// Graceful shutdown
const gracefulShutdown = async () => {
    logger.info('Shutting down servers gracefully');
    await httpServer.stop();
    process.exit(0);
};

const onSignal = () => {
    gracefulShutdown().catch(error => {
        logger.error('Shutdown failed', { error: String(error) });
        process.exit(1);
    });
};

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

export const app = httpServer.app;
