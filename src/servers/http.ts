/**
 * HTTP Server
 *
 * Hono app wiring the request pipeline to its routes, served on Node through
 * @hono/node-server. Endpoints are compiled here, once, against the
 * validator handed in by the entry point.
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';

import { HttpErrors, isHttpError } from '@src/lib/errors/http-error.js';
import { defineEndpoint } from '@src/lib/extraction/endpoint.js';
import { logger } from '@src/lib/logger.js';
import * as middleware from '@src/lib/middleware/index.js';
import type { AppEnv } from '@src/lib/types/app-env.js';
import type { Validator } from '@src/lib/validators/validator.js';

// Route handlers
import { UserRequest } from '@src/routes/request.js';
import * as userRoutes from '@src/routes/users/routes.js';
import SearchGet, { fields as searchFields, group as searchGroup } from '@src/routes/search/GET.js';
import HealthGet from '@src/routes/health/GET.js';

/**
 * Create and configure the Hono HTTP app
 *
 * @throws ConfigurationError when a route's field descriptors are invalid
 */
export function createHttpApp(validator: Validator): Hono<AppEnv> {
    const app = new Hono<AppEnv>();

    const userCreate = defineEndpoint(validator, UserRequest, userRoutes.userCreateFields);
    const userUpdate = defineEndpoint(validator, UserRequest, userRoutes.userUpdateFields);
    const search = defineEndpoint(validator, UserRequest, searchFields);

    app.use('*', middleware.requestLoggerMiddleware);
    app.use('*', middleware.bodyParserMiddleware);

    // Health check endpoint
    app.get('/health', HealthGet);

    // User routes
    app.post('/users', middleware.requestValidator(userCreate, userRoutes.userCreateGroup), userRoutes.UserCreate);
    app.put('/users/:user_id', middleware.requestValidator(userUpdate, userRoutes.userUpdateGroup), userRoutes.UserUpdate);

    // Search routes
    app.get('/search', middleware.requestValidator(search, searchGroup), SearchGet);

    // Error handling
    app.onError((err, c) => {
        if (isHttpError(err)) {
            return c.json(err.toJSON(), err.statusCode);
        }

        logger.error('Unhandled request error', {
            method: c.req.method,
            path: c.req.path,
            error: err.message,
        });
        return c.json(HttpErrors.internal().toJSON(), 500);
    });

    // 404 handler
    app.notFound(c => c.json(HttpErrors.notFound().toJSON(), 404));

    return app;
}

export interface HttpServerHandle {
    app: Hono<AppEnv>;
    server: ServerType;
    stop: () => Promise<void>;
}

/**
 * Start the HTTP server
 */
export function startHttpServer(port: number, validator: Validator): HttpServerHandle {
    const app = createHttpApp(validator);

    const server = serve({
        fetch: app.fetch,
        port,
    });

    logger.info('HTTP server running', { port, url: `http://localhost:${port}` });

    return {
        app,
        server,
        stop: () =>
            new Promise<void>((resolve, reject) => {
                server.close(error => {
                    if (error) {
                        reject(error);
                        return;
                    }
                    logger.info('HTTP server stopped');
                    resolve();
                });
            }),
    };
}
