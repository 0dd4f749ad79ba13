/**
 * Extraction Pipeline
 *
 * Per field: lookup -> presence policy -> coerce. Every descriptor is visited
 * even after a failure so a single response lists every missing or
 * unparsable field. Nothing here throws for bad input.
 */

import { decodeBodyValue, describeBodyValue } from '@src/lib/coercion/body-decoder.js';
import { coerce, type CoercionResult } from '@src/lib/coercion/coercer.js';
import type { RecordSchema } from '@src/lib/field-types.js';
import type { CompiledField, Endpoint } from '@src/lib/extraction/endpoint.js';
import {
    ABSENT,
    readBody,
    readSource,
    type RequestSources,
    type SourceValue,
} from '@src/lib/sources/request-sources.js';
import { TypedRecord } from '@src/lib/typed-record.js';
import { validationError, type ValidationError } from '@src/lib/types/validation.js';

export type ExtractionResult<S extends RecordSchema> =
    | { ok: true; record: TypedRecord<S> }
    | { ok: false; errors: ValidationError[] };

/**
 * Materialise every body field from the decoded payload in one pass,
 * ahead of the per-field loop.
 */
export function materializeBody(
    fields: readonly CompiledField[],
    body: RequestSources['body']
): Map<string, SourceValue> {
    const values = new Map<string, SourceValue>();
    for (const field of fields) {
        if (field.source === 'body') {
            values.set(field.name, readBody(body, field.key));
        }
    }
    return values;
}

export function extractFields<S extends RecordSchema>(
    endpoint: Endpoint<S>,
    sources: RequestSources
): ExtractionResult<S> {
    const record = new TypedRecord(endpoint.schema);
    const errors: ValidationError[] = [];
    const bodyValues = materializeBody(endpoint.fields, sources.body);

    for (const field of endpoint.fields) {
        const found = field.source === 'body'
            ? bodyValues.get(field.name) ?? ABSENT
            : readSource(sources, field.source, field.key);

        let result: CoercionResult;
        let raw: string;

        if (!found.present) {
            if (field.defaultText !== undefined) {
                raw = field.defaultText;
                result = coerce(raw, field.kind);
            } else {
                if (field.required) {
                    errors.push(validationError(field.name, endpoint.validator.requiredMessage(field)));
                }
                continue;
            }
        } else if (found.form === 'text') {
            raw = found.text;
            result = coerce(raw, field.kind);
        } else {
            raw = describeBodyValue(found.value);
            result = decodeBodyValue(found.value, field.kind);
        }

        if (result.ok) {
            record.assign(field.name, result.value);
        } else {
            errors.push(validationError(field.name, result.message, raw));
        }
    }

    return errors.length > 0 ? { ok: false, errors } : { ok: true, record };
}
