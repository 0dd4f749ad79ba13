/**
 * Endpoint Definition
 *
 * Binds an ordered list of field descriptors to a record schema and a
 * validator. Everything that can be checked without a request is checked
 * here, once, so a miswired endpoint fails at start-up instead of on its
 * first request.
 */

import { coerce } from '@src/lib/coercion/coercer.js';
import { ConfigurationError } from '@src/lib/errors/configuration-error.js';
import type { RecordSchema } from '@src/lib/field-types.js';
import { isSourceKind, type SourceKind } from '@src/lib/sources/request-sources.js';
import type { ValidationTarget, Validator } from '@src/lib/validators/validator.js';

/**
 * Static description of one field of an endpoint
 *
 * @example
 * { name: 'Name', source: 'body', required: true, rules: 'required,min=3,max=50' }
 */
export interface FieldDescriptor {
    /** Field name in the record schema */
    name: string;
    source: SourceKind;
    required?: boolean;
    /** Literal coerced like request text when the field is absent */
    default?: string;
    /** Rule expression, e.g. `required,min=3,max=50` */
    rules?: string;
}

export interface CompiledField extends ValidationTarget {
    readonly source: SourceKind;
    /** Wire key looked up in the source */
    readonly key: string;
    readonly required: boolean;
    readonly defaultText?: string;
}

export interface Endpoint<S extends RecordSchema> {
    readonly schema: S;
    readonly validator: Validator;
    readonly fields: readonly CompiledField[];
}

export function defineEndpoint<S extends RecordSchema>(
    validator: Validator,
    schema: S,
    descriptors: readonly FieldDescriptor[]
): Endpoint<S> {
    const seen = new Set<string>();
    const fields: CompiledField[] = [];

    for (const descriptor of descriptors) {
        const { name, source } = descriptor;

        if (!Object.hasOwn(schema, name)) {
            throw new ConfigurationError('descriptor names a field the record does not have', name);
        }
        if (!isSourceKind(source)) {
            throw new ConfigurationError(`unknown source '${source}'`, name);
        }
        if (seen.has(name)) {
            throw new ConfigurationError('field is described more than once', name);
        }
        seen.add(name);

        const { kind, key } = schema[name];

        if (descriptor.default !== undefined) {
            const result = coerce(descriptor.default, kind);
            if (!result.ok) {
                throw new ConfigurationError(`default '${descriptor.default}' ${result.message}`, name);
            }
        }

        const compiled: CompiledField = {
            name,
            kind,
            key,
            source,
            required: descriptor.required ?? false,
            rules: validator.compile(descriptor.rules ?? '', kind, name),
        };

        fields.push(descriptor.default === undefined ? compiled : { ...compiled, defaultText: descriptor.default });
    }

    return { schema, validator, fields };
}
