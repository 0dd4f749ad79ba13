import { describe, it, expect } from 'vitest';
import { createSources, readBody, readSource } from '@src/lib/sources/request-sources.js';

describe('readBody', () => {
    it('returns the decoded value for a present key', () => {
        expect(readBody({ name: 'Al' }, 'name')).toEqual({ present: true, form: 'decoded', value: 'Al' });
    });

    it('keeps falsy values present', () => {
        expect(readBody({ rating: 0 }, 'rating')).toEqual({ present: true, form: 'decoded', value: 0 });
        expect(readBody({ name: '' }, 'name')).toEqual({ present: true, form: 'decoded', value: '' });
    });

    it('treats missing keys, null and a missing body as absent', () => {
        expect(readBody({}, 'name')).toEqual({ present: false });
        expect(readBody({ name: null }, 'name')).toEqual({ present: false });
        expect(readBody(undefined, 'name')).toEqual({ present: false });
    });

    it('ignores inherited properties', () => {
        expect(readBody({}, 'toString')).toEqual({ present: false });
    });
});

describe('readSource', () => {
    const sources = createSources({
        body: { name: 'Alice' },
        query: new URLSearchParams('tags=a,b&rating=&tags=c'),
        path: { user_id: '42' },
    });

    it('dispatches on the source tag', () => {
        expect(readSource(sources, 'body', 'name')).toEqual({ present: true, form: 'decoded', value: 'Alice' });
        expect(readSource(sources, 'path', 'user_id')).toEqual({ present: true, form: 'text', text: '42' });
    });

    it('uses the first occurrence of a repeated query key', () => {
        expect(readSource(sources, 'query', 'tags')).toEqual({ present: true, form: 'text', text: 'a,b' });
    });

    it('distinguishes a present empty value from an absent one', () => {
        expect(readSource(sources, 'query', 'rating')).toEqual({ present: true, form: 'text', text: '' });
        expect(readSource(sources, 'query', 'missing')).toEqual({ present: false });
    });

    it('does not look across sources', () => {
        expect(readSource(sources, 'query', 'name')).toEqual({ present: false });
        expect(readSource(sources, 'body', 'user_id')).toEqual({ present: false });
    });

    it('reports every lookup absent for sources that were not given', () => {
        const empty = createSources({});
        expect(readSource(empty, 'path', 'user_id')).toEqual({ present: false });
        expect(readSource(empty, 'query', 'tags')).toEqual({ present: false });
    });
});
