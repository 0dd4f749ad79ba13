/**
 * Body Value Decoder
 *
 * Body fields arrive already decoded (JSON), so instead of parsing text this
 * checks each decoded value against the field kind. JSON types are never
 * converted into one another: `"5"` is not an int and `5` is not a string.
 */

import type { FieldKind, FieldValueMap } from '@src/lib/field-types.js';
import { COERCION_MESSAGES, type CoercionFailure, type CoercionResult } from '@src/lib/coercion/coercer.js';

export const BODY_MESSAGES = {
    string: 'must be a string',
    list: 'must be a list',
    stringElement: (position: number) => `element ${position}: must be a string`,
} as const;

function fail(message: string): CoercionFailure {
    return { ok: false, message };
}

function isInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isSafeInteger(value);
}

const DECODERS: { [K in FieldKind]: (value: unknown) => CoercionResult<FieldValueMap[K]> } = {
    string: value => (typeof value === 'string' ? { ok: true, value } : fail(BODY_MESSAGES.string)),

    int: value => (isInteger(value) ? { ok: true, value } : fail(COERCION_MESSAGES.int)),

    uint: value => (isInteger(value) && value >= 0 ? { ok: true, value } : fail(COERCION_MESSAGES.uint)),

    bool: value => (typeof value === 'boolean' ? { ok: true, value } : fail(COERCION_MESSAGES.bool)),

    'string[]': value => {
        if (!Array.isArray(value)) {
            return fail(BODY_MESSAGES.list);
        }
        const items: string[] = [];
        for (const [index, item] of value.entries()) {
            if (typeof item !== 'string') {
                return fail(BODY_MESSAGES.stringElement(index + 1));
            }
            items.push(item);
        }
        return { ok: true, value: items };
    },

    'uint[]': value => {
        if (!Array.isArray(value)) {
            return fail(BODY_MESSAGES.list);
        }
        const items: number[] = [];
        for (const [index, item] of value.entries()) {
            if (!isInteger(item) || item < 0) {
                return fail(COERCION_MESSAGES.uintElement(index + 1));
            }
            items.push(item);
        }
        return { ok: true, value: items };
    },
};

export function decodeBodyValue<K extends FieldKind>(value: unknown, kind: K): CoercionResult<FieldValueMap[K]> {
    return DECODERS[kind](value);
}

/**
 * Text form of a decoded value for error reports
 */
export function describeBodyValue(value: unknown): string {
    return typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
}
