/**
 * Request Body Parser Middleware
 *
 * Decodes the whole JSON payload once, before any field is extracted.
 * Sets context.get('parsedBody') for the request validator to consume.
 *
 * - GET, HEAD, DELETE and empty bodies: no body
 * - Content-Type present and not JSON: 415
 * - Malformed JSON or anything but a JSON object: 400 "Invalid request body"
 */

import type { MiddlewareHandler } from 'hono';
import { HttpErrors } from '@src/lib/errors/http-error.js';
import type { AppEnv } from '@src/lib/types/app-env.js';

export const INVALID_BODY_MESSAGE = 'Invalid request body';

const BODYLESS_METHODS = new Set(['GET', 'HEAD', 'DELETE', 'OPTIONS']);

function isJsonContentType(contentType: string): boolean {
    const mediaType = contentType.split(';')[0].trim().toLowerCase();
    return mediaType === 'application/json' || mediaType.endsWith('+json');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the text of a JSON body into an object
 *
 * @throws HttpError 400 when the text is not a JSON object
 */
export function decodeJsonBody(text: string): Record<string, unknown> {
    let decoded: unknown;
    try {
        decoded = JSON.parse(text);
    } catch {
        throw HttpErrors.badRequest(INVALID_BODY_MESSAGE, 'BODY_MALFORMED');
    }

    if (!isPlainObject(decoded)) {
        throw HttpErrors.badRequest(INVALID_BODY_MESSAGE, 'BODY_NOT_OBJECT');
    }

    return decoded;
}

export const bodyParserMiddleware: MiddlewareHandler<AppEnv> = async (context, next) => {
    context.set('parsedBody', undefined);

    if (BODYLESS_METHODS.has(context.req.method)) {
        return await next();
    }

    const text = await context.req.text();
    if (text.trim() === '') {
        return await next();
    }

    const contentType = context.req.header('content-type');
    if (contentType !== undefined && !isJsonContentType(contentType)) {
        throw HttpErrors.unsupportedMediaType(`Unsupported content type '${contentType}'`);
    }

    context.set('parsedBody', decodeJsonBody(text));

    await next();
};
