/**
 * Middleware Barrel Export
 *
 * Request parsing, per-endpoint validation and request logging for Hono
 * route handling.
 */

export { bodyParserMiddleware } from './body-parser.js';
export { requestValidator, sourcesFromContext } from './request-validator.js';
export { requestLoggerMiddleware } from './request-logger.js';
