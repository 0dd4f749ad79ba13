import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@src/lib/errors/configuration-error.js';
import { defineEndpoint } from '@src/lib/extraction/endpoint.js';
import { defineRecord, field } from '@src/lib/field-types.js';
import { Validator } from '@src/lib/validators/validator.js';

const Order = defineRecord({
    OrderID: field.uint('order_id'),
    Note: field.string('note'),
    Rating: field.int('rating'),
});

describe('defineEndpoint', () => {
    const validator = new Validator();

    it('compiles descriptors in declaration order with their wire keys', () => {
        const endpoint = defineEndpoint(validator, Order, [
            { name: 'OrderID', source: 'path', required: true, rules: 'required,min=1' },
            { name: 'Rating', source: 'query', default: '5' },
        ]);

        expect(endpoint.fields.map(f => [f.name, f.key, f.source, f.required])).toEqual([
            ['OrderID', 'order_id', 'path', true],
            ['Rating', 'rating', 'query', false],
        ]);
        expect(endpoint.fields[1].defaultText).toBe('5');
        expect(endpoint.fields[1].rules.field.rules).toEqual([]);
    });

    it('rejects a name the record does not have', () => {
        expect(() => defineEndpoint(validator, Order, [{ name: 'Missing', source: 'body' }])).toThrow(
            'Missing: descriptor names a field the record does not have'
        );
    });

    it('rejects a field described twice', () => {
        expect(() =>
            defineEndpoint(validator, Order, [
                { name: 'Note', source: 'body' },
                { name: 'Note', source: 'query' },
            ])
        ).toThrow('Note: field is described more than once');
    });

    it('rejects an unknown source', () => {
        const descriptors = JSON.parse('[{"name":"Note","source":"header"}]');
        expect(() => defineEndpoint(validator, Order, descriptors)).toThrow("Note: unknown source 'header'");
    });

    it('rejects a default that does not coerce', () => {
        expect(() => defineEndpoint(validator, Order, [{ name: 'Rating', source: 'query', default: 'five' }])).toThrow(
            "Rating: default 'five' must be a valid integer"
        );
    });

    it('rejects a bad rule expression', () => {
        expect(() => defineEndpoint(validator, Order, [{ name: 'Note', source: 'body', rules: 'sometimes' }])).toThrow(
            ConfigurationError
        );
    });
});
