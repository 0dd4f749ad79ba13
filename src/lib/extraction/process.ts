/**
 * Request Processing
 *
 * Runs extraction, then validation, and folds the result into one of three
 * outcomes. Extraction failures short-circuit: a record with missing or
 * unparsable fields never reaches the validator.
 */

import type { RecordSchema } from '@src/lib/field-types.js';
import type { Endpoint } from '@src/lib/extraction/endpoint.js';
import { extractFields } from '@src/lib/extraction/pipeline.js';
import { logger } from '@src/lib/logger.js';
import type { RequestSources } from '@src/lib/sources/request-sources.js';
import type { TypedRecord } from '@src/lib/typed-record.js';
import type { ErrorResponse } from '@src/lib/types/validation.js';

export const OUTCOME_MESSAGES = {
    badRequest: 'Invalid request data',
    unprocessable: 'Validation failed',
} as const;

export type Outcome<S extends RecordSchema> =
    | { kind: 'bad-request'; response: ErrorResponse }
    | { kind: 'unprocessable'; response: ErrorResponse }
    | { kind: 'valid'; record: TypedRecord<S> };

export type SuccessStatus = 200 | 201;
export type OutcomeStatus = 400 | 422 | SuccessStatus;

/**
 * @param group - validation group the request runs under (`create`, `update`, ...)
 */
export function processRequest<S extends RecordSchema>(
    endpoint: Endpoint<S>,
    group: string,
    sources: RequestSources
): Outcome<S> {
    const extraction = extractFields(endpoint, sources);

    if (!extraction.ok) {
        logger.debug('Request extraction failed', {
            group,
            fields: extraction.errors.map(error => error.field),
        });
        return {
            kind: 'bad-request',
            response: { code: 400, message: OUTCOME_MESSAGES.badRequest, errors: extraction.errors },
        };
    }

    const errors = endpoint.validator.validate(extraction.record, endpoint.fields, group);

    if (errors.length > 0) {
        logger.debug('Request validation failed', {
            group,
            fields: errors.map(error => error.field),
        });
        return {
            kind: 'unprocessable',
            response: { code: 422, message: OUTCOME_MESSAGES.unprocessable, errors },
        };
    }

    return { kind: 'valid', record: extraction.record };
}

/**
 * HTTP status for an outcome; `success` is 201 for creating routes
 */
export function outcomeStatus<S extends RecordSchema>(outcome: Outcome<S>, success: SuccessStatus = 200): OutcomeStatus {
    switch (outcome.kind) {
        case 'bad-request':
            return 400;
        case 'unprocessable':
            return 422;
        case 'valid':
            return success;
    }
}
