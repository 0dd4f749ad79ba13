/**
 * HttpError - Structured HTTP error handling for transport failures
 *
 * Raised by middleware for problems with the request envelope itself
 * (unreadable body, unsupported content type). Field-level problems never
 * use this class: they travel as ValidationError entries inside an
 * ErrorResponse built by the request pipeline.
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Structured HTTP error for API responses
 *
 * Separates request-envelope errors from HTTP transport concerns.
 * Middleware throws semantic errors, the app error handler renders them.
 */
export class HttpError extends Error {
    public readonly name = 'HttpError';

    constructor(
        public readonly statusCode: ContentfulStatusCode,
        message: string,
        public readonly errorCode?: string
    ) {
        super(message);

        // Maintain proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, HttpError.prototype);
    }

    /**
     * Same `{ code, message }` envelope the request pipeline uses for its failures
     */
    toJSON() {
        return {
            code: this.statusCode,
            message: this.message,
        };
    }
}

/**
 * Factory methods for common HTTP error scenarios
 */
export class HttpErrors {
    static badRequest(message: string, errorCode = 'BAD_REQUEST') {
        return new HttpError(400, message, errorCode);
    }

    static notFound(message = 'Not found', errorCode = 'NOT_FOUND') {
        return new HttpError(404, message, errorCode);
    }

    static unsupportedMediaType(message: string, errorCode = 'UNSUPPORTED_MEDIA_TYPE') {
        return new HttpError(415, message, errorCode);
    }

    static internal(message = 'Internal server error', errorCode = 'INTERNAL_ERROR') {
        return new HttpError(500, message, errorCode);
    }
}

/**
 * Type guard for HttpError instances
 */
export function isHttpError(error: unknown): error is HttpError {
    return error instanceof HttpError;
}
