import { describe, it, expect } from 'vitest';
import { coerce, COERCION_MESSAGES } from '@src/lib/coercion/coercer.js';

describe('coerce', () => {
    describe('string', () => {
        it('returns the raw text unchanged', () => {
            expect(coerce('  hello ', 'string')).toEqual({ ok: true, value: '  hello ' });
        });

        it('accepts the empty string', () => {
            expect(coerce('', 'string')).toEqual({ ok: true, value: '' });
        });
    });

    describe('int', () => {
        it('parses signed base-10 integers', () => {
            expect(coerce('42', 'int')).toEqual({ ok: true, value: 42 });
            expect(coerce('-7', 'int')).toEqual({ ok: true, value: -7 });
            expect(coerce('+3', 'int')).toEqual({ ok: true, value: 3 });
        });

        it('normalises negative zero', () => {
            const result = coerce('-0', 'int');
            expect(result.ok && Object.is(result.value, 0)).toBe(true);
        });

        it('rejects text that is not consumed whole', () => {
            for (const raw of ['', '12abc', '1.5', ' 4', '0x10', '1e3']) {
                expect(coerce(raw, 'int')).toEqual({ ok: false, message: COERCION_MESSAGES.int });
            }
        });

        it('rejects values outside the safe integer range', () => {
            expect(coerce('9007199254740993', 'int')).toEqual({ ok: false, message: 'must be a valid integer' });
        });
    });

    describe('uint', () => {
        it('parses unsigned integers', () => {
            expect(coerce('0', 'uint')).toEqual({ ok: true, value: 0 });
            expect(coerce('123', 'uint')).toEqual({ ok: true, value: 123 });
        });

        it('rejects signs and non-digits', () => {
            for (const raw of ['-1', '+1', 'abc', '']) {
                expect(coerce(raw, 'uint')).toEqual({ ok: false, message: 'must be a positive integer' });
            }
        });
    });

    describe('bool', () => {
        it('maps the true words', () => {
            for (const raw of ['true', 'TRUE', '1', 'on', 'Yes']) {
                expect(coerce(raw, 'bool')).toEqual({ ok: true, value: true });
            }
        });

        it('maps the false words and the empty string', () => {
            for (const raw of ['false', '0', 'off', 'NO', '']) {
                expect(coerce(raw, 'bool')).toEqual({ ok: true, value: false });
            }
        });

        it('rejects anything else', () => {
            expect(coerce('maybe', 'bool')).toEqual({ ok: false, message: 'must be a boolean' });
        });
    });

    describe('string[]', () => {
        it('splits on commas and trims each element', () => {
            expect(coerce('tech, music ,sports', 'string[]')).toEqual({ ok: true, value: ['tech', 'music', 'sports'] });
        });

        it('returns an empty list when every element is empty', () => {
            expect(coerce('', 'string[]')).toEqual({ ok: true, value: [] });
            expect(coerce(' , ', 'string[]')).toEqual({ ok: true, value: [] });
        });

        it('keeps empty elements between non-empty ones', () => {
            expect(coerce('a,,b', 'string[]')).toEqual({ ok: true, value: ['a', '', 'b'] });
        });
    });

    describe('uint[]', () => {
        it('parses every element', () => {
            expect(coerce('7, 8,9', 'uint[]')).toEqual({ ok: true, value: [7, 8, 9] });
        });

        it('returns an empty list for empty input', () => {
            expect(coerce('', 'uint[]')).toEqual({ ok: true, value: [] });
        });

        it('reads its own comma-joined output back to the same list', () => {
            const first = coerce('4, 15,0', 'uint[]');
            expect(first).toEqual({ ok: true, value: [4, 15, 0] });

            if (first.ok) {
                expect(coerce(first.value.join(','), 'uint[]')).toEqual(first);
            }
        });

        it('names the first bad element by 1-based position', () => {
            expect(coerce('1,x,3', 'uint[]')).toEqual({ ok: false, message: 'element 2: must be positive integer' });
            expect(coerce('1,,3', 'uint[]')).toEqual({ ok: false, message: 'element 2: must be positive integer' });
            expect(coerce('-4', 'uint[]')).toEqual({ ok: false, message: COERCION_MESSAGES.uintElement(1) });
        });
    });
});
