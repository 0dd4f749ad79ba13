/**
 * Value Coercer
 *
 * Converts raw request text (query string values, route segments, default
 * literals) into typed field values. Pure: failures come back as a result,
 * never as an exception.
 */

import type { FieldKind, FieldValue, FieldValueMap } from '@src/lib/field-types.js';

export interface CoercionFailure {
    ok: false;
    message: string;
}

export type CoercionResult<T = FieldValue> = { ok: true; value: T } | CoercionFailure;

export const COERCION_MESSAGES = {
    int: 'must be a valid integer',
    uint: 'must be a positive integer',
    bool: 'must be a boolean',
    uintElement: (position: number) => `element ${position}: must be positive integer`,
} as const;

const INT_PATTERN = /^[+-]?\d+$/;
const UINT_PATTERN = /^\d+$/;

const TRUE_WORDS = new Set(['true', '1', 'on', 'yes']);
const FALSE_WORDS = new Set(['false', '0', 'off', 'no', '']);

function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

function fail(message: string): CoercionFailure {
    return { ok: false, message };
}

/**
 * Parse base-10 text that must be consumed whole. Values outside the safe
 * integer range are rejected rather than rounded.
 */
function parseInteger(raw: string, pattern: RegExp): number | null {
    if (!pattern.test(raw)) {
        return null;
    }
    const value = Number(raw);
    if (!Number.isSafeInteger(value)) {
        return null;
    }
    // Normalise -0
    return value === 0 ? 0 : value;
}

/**
 * Comma split with every element trimmed. Input whose elements are all
 * empty (`""`, `" , "`) is an empty list.
 */
function splitList(raw: string): string[] {
    const parts = raw.split(',').map(part => part.trim());
    return parts.every(part => part === '') ? [] : parts;
}

const COERCERS: { [K in FieldKind]: (raw: string) => CoercionResult<FieldValueMap[K]> } = {
    string: raw => ok(raw),

    int: raw => {
        const value = parseInteger(raw, INT_PATTERN);
        return value === null ? fail(COERCION_MESSAGES.int) : ok(value);
    },

    uint: raw => {
        const value = parseInteger(raw, UINT_PATTERN);
        return value === null ? fail(COERCION_MESSAGES.uint) : ok(value);
    },

    bool: raw => {
        const word = raw.toLowerCase();
        if (TRUE_WORDS.has(word)) {
            return ok(true);
        }
        if (FALSE_WORDS.has(word)) {
            return ok(false);
        }
        return fail(COERCION_MESSAGES.bool);
    },

    'string[]': raw => ok(splitList(raw)),

    'uint[]': raw => {
        const values: number[] = [];
        for (const [index, part] of splitList(raw).entries()) {
            const value = parseInteger(part, UINT_PATTERN);
            if (value === null) {
                return fail(COERCION_MESSAGES.uintElement(index + 1));
            }
            values.push(value);
        }
        return ok(values);
    },
};

/**
 * Coerce raw text to the value type of `kind`
 *
 * @example
 * coerce('7, 8', 'uint[]')   // { ok: true, value: [7, 8] }
 * coerce('-1', 'uint')       // { ok: false, message: 'must be a positive integer' }
 */
export function coerce<K extends FieldKind>(raw: string, kind: K): CoercionResult<FieldValueMap[K]> {
    return COERCERS[kind](raw);
}
