/**
 * Typed Record
 *
 * The assembled result of extraction: one value per schema field, reachable
 * through typed accessors. Fields that were never assigned read as the zero
 * value of their kind.
 */

import { ConfigurationError } from '@src/lib/errors/configuration-error.js';
import {
    isValueOfKind,
    zeroValue,
    type FieldValue,
    type FieldValueMap,
    type RecordSchema,
} from '@src/lib/field-types.js';

/**
 * Untyped view used by the validator and the HTTP layer
 */
export interface RecordReader {
    read(name: string): FieldValue | undefined;
    has(name: string): boolean;
    toJSON(): Record<string, FieldValue>;
}

export class TypedRecord<S extends RecordSchema> implements RecordReader {
    private readonly values = new Map<string, FieldValue>();

    constructor(readonly schema: S) {}

    /**
     * Store a value for a schema field. The value must already be of the
     * field's kind; coercion happens before this point.
     */
    assign(name: string, value: FieldValue): void {
        if (!Object.hasOwn(this.schema, name)) {
            throw new ConfigurationError('not a field of this record', name);
        }
        const spec = this.schema[name];
        if (!isValueOfKind(value, spec.kind)) {
            throw new ConfigurationError(`value is not of kind '${spec.kind}'`, name);
        }
        this.values.set(name, value);
    }

    get<N extends keyof S & string>(name: N): FieldValueMap[S[N]['kind']] {
        const kind: S[N]['kind'] = this.schema[name]['kind'];
        const value = this.values.get(name);
        if (value !== undefined && isValueOfKind(value, kind)) {
            return value;
        }
        return zeroValue(kind);
    }

    /**
     * Whether the field was assigned (from input or a default)
     */
    has(name: string): boolean {
        return this.values.has(name);
    }

    read(name: string): FieldValue | undefined {
        if (!Object.hasOwn(this.schema, name)) {
            return undefined;
        }
        return this.values.get(name) ?? zeroValue(this.schema[name].kind);
    }

    /**
     * Every schema field in schema order, zero values included, keyed by
     * wire key the way clients sent them
     */
    toJSON(): Record<string, FieldValue> {
        const result: Record<string, FieldValue> = {};
        for (const [name, spec] of Object.entries(this.schema)) {
            result[spec.key] = this.read(name) ?? zeroValue(spec.kind);
        }
        return result;
    }
}
