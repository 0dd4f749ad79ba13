/**
 * Validation Messages
 *
 * User-facing messages are format templates keyed by rule tag. A key of the
 * form `tag.shape` (`min.list`) wins over the bare tag, so one rule can word
 * its message differently for strings, numbers and lists.
 *
 * Placeholders: {field} {tag} {param} {values} {inner}
 */

import type { ValueShape } from '@src/lib/field-types.js';

export interface MessageContext {
    field: string;
    tag: string;
    shape: ValueShape;
    param?: string;
    /** List parameter joined with ", " */
    values?: string;
    /** Message of the element rule that failed under `dive` */
    inner?: string;
}

export type MessageTemplate = string | ((context: MessageContext) => string);

export type MessageCatalog = Readonly<Record<string, MessageTemplate>>;

export const DEFAULT_MESSAGES: MessageCatalog = {
    required: 'This field is required',
    'min.string': 'Minimum {param} characters required',
    'min.list': 'At least {param} items required',
    'min.number': 'Minimum value is {param}',
    'max.string': 'Maximum {param} characters allowed',
    'max.list': 'Maximum {param} items allowed',
    'max.number': 'Maximum value is {param}',
    in: 'Must be one of: {values}',
    unique: 'Contains duplicate values',
    email: 'Invalid email format',
    dive: 'Invalid element: {inner}',
};

/** Used for rules without a template of their own */
export const FALLBACK_MESSAGE = "Field validation for '{field}' failed on the '{tag}' tag";

const PLACEHOLDER = /\{(field|tag|param|values|inner)\}/g;

export function renderTemplate(template: MessageTemplate, context: MessageContext): string {
    if (typeof template === 'function') {
        return template(context);
    }
    return template.replace(PLACEHOLDER, (_match, name: string) => {
        switch (name) {
            case 'field':
                return context.field;
            case 'tag':
                return context.tag;
            case 'param':
                return context.param ?? '';
            case 'values':
                return context.values ?? '';
            default:
                return context.inner ?? '';
        }
    });
}

export function resolveTemplate(catalog: MessageCatalog, tag: string, shape: ValueShape): MessageTemplate {
    return catalog[`${tag}.${shape}`] ?? catalog[tag] ?? FALLBACK_MESSAGE;
}
