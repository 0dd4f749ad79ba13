/**
 * Field Type Utilities
 *
 * Value kinds a request field can hold and the record schema fields are
 * declared in. Fields that were never supplied read as the zero value of
 * their kind.
 */

import { ConfigurationError } from '@src/lib/errors/configuration-error.js';

/**
 * Value type produced for each field kind
 */
export interface FieldValueMap {
    string: string;
    int: number;
    uint: number;
    bool: boolean;
    'string[]': string[];
    'uint[]': number[];
}

export type FieldKind = keyof FieldValueMap;
export type FieldValue = FieldValueMap[FieldKind];

export const FIELD_KINDS: readonly FieldKind[] = ['string', 'int', 'uint', 'bool', 'string[]', 'uint[]'];

/**
 * Shape a rule sees when it checks a value. Lists are checked on their
 * item count; strings on their length; numbers on their value.
 */
export type ValueShape = 'string' | 'number' | 'boolean' | 'list';

const KIND_SHAPES: { [K in FieldKind]: ValueShape } = {
    string: 'string',
    int: 'number',
    uint: 'number',
    bool: 'boolean',
    'string[]': 'list',
    'uint[]': 'list',
};

const ELEMENT_KINDS: { [K in FieldKind]?: FieldKind } = {
    'string[]': 'string',
    'uint[]': 'uint',
};

export function isFieldKind(value: string): value is FieldKind {
    return FIELD_KINDS.some(kind => kind === value);
}

export function shapeOfKind(kind: FieldKind): ValueShape {
    return KIND_SHAPES[kind];
}

/**
 * Kind of the elements of a list kind, undefined for scalars
 */
export function elementKind(kind: FieldKind): FieldKind | undefined {
    return ELEMENT_KINDS[kind];
}

const ZERO_VALUES: { [K in FieldKind]: () => FieldValueMap[K] } = {
    string: () => '',
    int: () => 0,
    uint: () => 0,
    bool: () => false,
    'string[]': () => [],
    'uint[]': () => [],
};

export function zeroValue<K extends FieldKind>(kind: K): FieldValueMap[K] {
    return ZERO_VALUES[kind]();
}

/**
 * Zero test used by the `required` and `omitempty` rules
 */
export function isZero(value: FieldValue): boolean {
    if (Array.isArray(value)) {
        return value.length === 0;
    }
    return value === '' || value === 0 || value === false;
}

function isStringList(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isUintList(value: unknown): value is number[] {
    return Array.isArray(value) && value.every(item => Number.isSafeInteger(item) && item >= 0);
}

const KIND_GUARDS: { [K in FieldKind]: (value: unknown) => value is FieldValueMap[K] } = {
    string: (value): value is string => typeof value === 'string',
    int: (value): value is number => typeof value === 'number' && Number.isSafeInteger(value),
    uint: (value): value is number => typeof value === 'number' && Number.isSafeInteger(value) && value >= 0,
    bool: (value): value is boolean => typeof value === 'boolean',
    'string[]': isStringList,
    'uint[]': isUintList,
};

export function isValueOfKind<K extends FieldKind>(value: unknown, kind: K): value is FieldValueMap[K] {
    return KIND_GUARDS[kind](value);
}

/**
 * Render a value the way it travels on the wire: lists comma-joined
 */
export function stringifyValue(value: FieldValue): string {
    return Array.isArray(value) ? value.join(',') : String(value);
}

// ===========================
// Record Schema
// ===========================

/**
 * One field of a record: its kind and the wire key used to find it in the
 * body, query string or route parameters.
 */
export interface FieldSpec<K extends FieldKind = FieldKind> {
    readonly kind: K;
    readonly key: string;
}

export type RecordSchema = Readonly<Record<string, FieldSpec>>;

/**
 * Builders for schema entries
 *
 * @example
 * const request = defineRecord({
 *     Name: field.string('name'),
 *     IDs: field.uintList('ids'),
 * });
 */
export const field = {
    string: (key: string): FieldSpec<'string'> => ({ kind: 'string', key }),
    int: (key: string): FieldSpec<'int'> => ({ kind: 'int', key }),
    uint: (key: string): FieldSpec<'uint'> => ({ kind: 'uint', key }),
    bool: (key: string): FieldSpec<'bool'> => ({ kind: 'bool', key }),
    stringList: (key: string): FieldSpec<'string[]'> => ({ kind: 'string[]', key }),
    uintList: (key: string): FieldSpec<'uint[]'> => ({ kind: 'uint[]', key }),
};

/**
 * Check a record schema once at start-up.
 *
 * Schemas may come from plain objects (or JSON), so kinds are checked at run
 * time as well as by the compiler.
 */
export function defineRecord<S extends RecordSchema>(schema: S): S {
    const keys = new Set<string>();

    for (const [name, spec] of Object.entries(schema)) {
        if (!isFieldKind(spec.kind)) {
            throw new ConfigurationError(`unsupported field kind '${spec.kind}'`, name);
        }
        if (spec.key.trim() === '') {
            throw new ConfigurationError('wire key must not be empty', name);
        }
        if (keys.has(spec.key)) {
            throw new ConfigurationError(`wire key '${spec.key}' is used by more than one field`, name);
        }
        keys.add(spec.key);
    }

    return schema;
}
