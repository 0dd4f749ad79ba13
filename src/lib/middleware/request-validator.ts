/**
 * Request Validator Middleware
 *
 * Runs the extraction/validation pipeline for one endpoint and either
 * answers with the error envelope (400/422) or stores the accepted record
 * under context.get('validated') for the route handler.
 *
 * Must run after bodyParserMiddleware.
 */

import type { Context, MiddlewareHandler } from 'hono';
import { createErrorResponse } from '@src/lib/api-helpers.js';
import type { Endpoint } from '@src/lib/extraction/endpoint.js';
import { outcomeStatus, processRequest } from '@src/lib/extraction/process.js';
import type { RecordSchema } from '@src/lib/field-types.js';
import { ABSENT, type ParamLookup, type RequestSources } from '@src/lib/sources/request-sources.js';
import type { AppEnv } from '@src/lib/types/app-env.js';

function present(text: string | undefined) {
    return text === undefined ? ABSENT : { present: true as const, text };
}

/**
 * Request sources backed by the Hono request; query and route values arrive
 * already percent-decoded.
 */
export function sourcesFromContext(context: Context<AppEnv>): RequestSources {
    const query: ParamLookup = key => present(context.req.query(key));
    const path: ParamLookup = key => {
        const text: string | undefined = context.req.param(key);
        return present(text);
    };

    return { body: context.get('parsedBody'), query, path };
}

export function requestValidator<S extends RecordSchema>(
    endpoint: Endpoint<S>,
    group: string
): MiddlewareHandler<AppEnv> {
    return async (context, next) => {
        const outcome = processRequest(endpoint, group, sourcesFromContext(context));

        if (outcome.kind !== 'valid') {
            return createErrorResponse(context, outcome.response, outcomeStatus(outcome));
        }

        context.set('validated', outcome.record);
        await next();
    };
}
