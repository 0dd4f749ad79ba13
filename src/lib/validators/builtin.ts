/**
 * Built-in Validation Rules
 *
 * Each definition states what its parameter looks like and which value
 * shapes it can check; the Validator enforces both when an endpoint is
 * defined, so `check` only ever sees values it understands.
 */

import { isZero, type FieldValue, type ValueShape } from '@src/lib/field-types.js';
import type { MessageTemplate } from '@src/lib/validators/messages.js';
import type { Rule } from '@src/lib/validators/rules.js';

/**
 * none: no parameter allowed; number: numeric limit; list: comma list;
 * text: any parameter required. Omitted: parameter optional and uninterpreted.
 */
export type ParamMode = 'none' | 'number' | 'list' | 'text';

export interface RuleDefinition {
    param?: ParamMode;
    /** Shapes the rule can check; every shape when omitted */
    shapes?: readonly ValueShape[];
    check: (value: FieldValue, rule: Rule) => boolean;
    message?: MessageTemplate;
}

// Dot-atom local part; the domain needs at least two labels
const EMAIL_PATTERN =
    /^[a-zA-Z0-9!#$%&'*+\/=?^_`{|}~-]+(?:\.[a-zA-Z0-9!#$%&'*+\/=?^_`{|}~-]+)*@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)+$/;

const SIZED_SHAPES: readonly ValueShape[] = ['string', 'number', 'list'];

/**
 * Length in code points for strings, item count for lists, the value itself
 * for numbers
 */
export function measure(value: FieldValue): number {
    if (typeof value === 'string') {
        return [...value].length;
    }
    if (Array.isArray(value)) {
        return value.length;
    }
    return Number(value);
}

function withinLimit(value: FieldValue, rule: Rule, compare: (size: number, limit: number) => boolean): boolean {
    return rule.limit === undefined || compare(measure(value), rule.limit);
}

export const BUILTIN_RULES: Readonly<Record<string, RuleDefinition>> = {
    required: {
        param: 'none',
        check: value => !isZero(value),
    },

    min: {
        param: 'number',
        shapes: SIZED_SHAPES,
        check: (value, rule) => withinLimit(value, rule, (size, limit) => size >= limit),
    },

    max: {
        param: 'number',
        shapes: SIZED_SHAPES,
        check: (value, rule) => withinLimit(value, rule, (size, limit) => size <= limit),
    },

    in: {
        param: 'list',
        shapes: ['string', 'number', 'boolean'],
        check: (value, rule) => (rule.values ?? []).includes(String(value)),
    },

    unique: {
        param: 'none',
        shapes: ['list'],
        check: value => {
            if (!Array.isArray(value)) {
                return true;
            }
            const items: readonly FieldValue[] = value;
            return new Set(items.map(item => String(item))).size === items.length;
        },
    },

    email: {
        param: 'none',
        shapes: ['string'],
        check: value => typeof value === 'string' && EMAIL_PATTERN.test(value),
    },
};
