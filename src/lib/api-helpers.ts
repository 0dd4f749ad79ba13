import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { FieldValue } from '@src/lib/field-types.js';
import type { RecordReader } from '@src/lib/typed-record.js';
import type { ErrorResponse } from '@src/lib/types/validation.js';
import type { SuccessStatus } from '@src/lib/extraction/process.js';

/**
 * API Response Helpers
 *
 * Every response the request pipeline produces goes through one of these,
 * so the envelopes stay identical across routes.
 */

export interface ValidResponse {
    status: 'valid';
    data: Record<string, FieldValue>;
}

/**
 * 400/422 envelope with the field errors in declaration order
 */
export function createErrorResponse(context: Context, response: ErrorResponse, status: ContentfulStatusCode) {
    return context.json(response, status);
}

export function createValidResponse(context: Context, record: RecordReader, status: SuccessStatus = 200) {
    const body: ValidResponse = { status: 'valid', data: record.toJSON() };
    return context.json(body, status);
}
