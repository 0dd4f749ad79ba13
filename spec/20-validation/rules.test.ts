import { describe, it, expect } from 'vitest';
import { parseLimit, parseList, tokenizeRules } from '@src/lib/validators/rules.js';

const LIST_RULES = new Set(['in']);
const KNOWN = new Set(['required', 'min', 'max', 'in', 'dive', 'omitempty', 'unique', 'create']);

function tokenize(expression: string) {
    return tokenizeRules(expression, tag => LIST_RULES.has(tag), tag => KNOWN.has(tag));
}

describe('tokenizeRules', () => {
    it('splits tags and parameters', () => {
        expect(tokenize('required,min=3,max=50')).toEqual([
            { tag: 'required' },
            { tag: 'min', param: '3' },
            { tag: 'max', param: '50' },
        ]);
    });

    it('folds bare tokens after a list rule into its parameter', () => {
        expect(tokenize('dive,in=tech,sports,politics')).toEqual([
            { tag: 'dive' },
            { tag: 'in', param: 'tech,sports,politics' },
        ]);
    });

    it('stops folding at a known tag', () => {
        expect(tokenize('in=a,b,required,c')).toEqual([
            { tag: 'in', param: 'a,b' },
            { tag: 'required' },
            { tag: 'c' },
        ]);
    });

    it('stops folding at a token with its own parameter', () => {
        expect(tokenize('in=a,b,max=3')).toEqual([
            { tag: 'in', param: 'a,b' },
            { tag: 'max', param: '3' },
        ]);
    });

    it('ignores whitespace and empty pieces', () => {
        expect(tokenize(' required , ,min = 2 ')).toEqual([{ tag: 'required' }, { tag: 'min', param: '2' }]);
        expect(tokenize('')).toEqual([]);
    });
});

describe('parameters', () => {
    it('parses numeric limits', () => {
        expect(parseLimit('3')).toBe(3);
        expect(parseLimit('-1.5')).toBe(-1.5);
        expect(parseLimit('three')).toBeNull();
        expect(parseLimit('')).toBeNull();
    });

    it('parses list values', () => {
        expect(parseList('tech, sports,,politics')).toEqual(['tech', 'sports', 'politics']);
    });
});
