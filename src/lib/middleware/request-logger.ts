/**
 * Request Logging Middleware
 *
 * One line per request once the response is known.
 */

import type { MiddlewareHandler } from 'hono';
import { logger } from '@src/lib/logger.js';
import type { AppEnv } from '@src/lib/types/app-env.js';

export const requestLoggerMiddleware: MiddlewareHandler<AppEnv> = async (context, next) => {
    const start = Date.now();
    const method = context.req.method;
    const path = context.req.path;

    await next();

    logger.info('Request completed', {
        method,
        path,
        status: context.res.status,
        duration: Date.now() - start,
    });
};
