/**
 * Validator
 *
 * Holds the rule registry, message catalog and validation group names.
 * Constructed once at start-up with every custom rule passed explicitly,
 * and never mutated afterwards, so one instance serves every request.
 *
 * Evaluation policy: rules of a field run in declaration order and stop at
 * the first failure; every field is visited, so one pass reports every
 * failing field. Under `dive`, every failing element is reported.
 */

import { ConfigurationError } from '@src/lib/errors/configuration-error.js';
import {
    elementKind,
    isZero,
    shapeOfKind,
    stringifyValue,
    type FieldKind,
    type FieldValue,
    type ValueShape,
} from '@src/lib/field-types.js';
import type { RecordReader } from '@src/lib/typed-record.js';
import { validationError, type ValidationError } from '@src/lib/types/validation.js';
import { BUILTIN_RULES, type RuleDefinition } from '@src/lib/validators/builtin.js';
import {
    DEFAULT_MESSAGES,
    renderTemplate,
    resolveTemplate,
    type MessageCatalog,
    type MessageContext,
    type MessageTemplate,
} from '@src/lib/validators/messages.js';
import {
    DIVE,
    OMIT_EMPTY,
    parseLimit,
    parseList,
    tokenizeRules,
    type Rule,
    type RuleChain,
    type RuleSet,
    type RuleToken,
} from '@src/lib/validators/rules.js';

export const DEFAULT_GROUPS: readonly string[] = ['create', 'update'];

export interface ValidatorOptions {
    /** Custom rules, by tag. Tags may not shadow built-ins, keywords or groups. */
    rules?: Readonly<Record<string, RuleDefinition>>;
    /** Message templates merged over the defaults */
    messages?: MessageCatalog;
    /** Tags that scope a field to a validation group */
    groups?: readonly string[];
}

/**
 * A field as the validator sees it
 */
export interface ValidationTarget {
    readonly name: string;
    readonly kind: FieldKind;
    readonly rules: RuleChain;
}

interface RuleFailure {
    rule: Rule;
    shape: ValueShape;
}

const TAG_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class Validator {
    private readonly rules: ReadonlyMap<string, RuleDefinition>;
    private readonly messages: MessageCatalog;
    private readonly groups: ReadonlySet<string>;

    constructor(options: ValidatorOptions = {}) {
        const groups = new Set(options.groups ?? DEFAULT_GROUPS);
        const rules = new Map(Object.entries(BUILTIN_RULES));
        const messages: Record<string, MessageTemplate> = { ...DEFAULT_MESSAGES };

        for (const group of groups) {
            this.assertFreeTag(group, rules, 'group');
        }

        for (const [tag, definition] of Object.entries(options.rules ?? {})) {
            this.assertFreeTag(tag, rules, 'rule');
            if (groups.has(tag)) {
                throw new ConfigurationError('rule tag is already a validation group', tag);
            }
            rules.set(tag, definition);
            if (definition.message !== undefined) {
                messages[tag] = definition.message;
            }
        }

        Object.assign(messages, options.messages);

        this.rules = rules;
        this.messages = messages;
        this.groups = groups;
    }

    hasRule(tag: string): boolean {
        return this.rules.has(tag);
    }

    isGroup(tag: string): boolean {
        return this.groups.has(tag);
    }

    /**
     * Parse a rule expression for a field of the given kind.
     *
     * @throws ConfigurationError for unknown tags, bad parameters, rules that
     *         cannot check the field's kind and misplaced `dive`
     */
    compile(expression: string, kind: FieldKind, fieldName: string): RuleChain {
        const tokens = tokenizeRules(
            expression,
            tag => this.rules.get(tag)?.param === 'list',
            tag => this.isKnownTag(tag)
        );

        const groups: string[] = [];
        const field: { omitEmpty: boolean; rules: Rule[] } = { omitEmpty: false, rules: [] };
        let element: { omitEmpty: boolean; rules: Rule[] } | undefined;
        let current = field;
        let shape = shapeOfKind(kind);

        for (const token of tokens) {
            if (token.tag === DIVE) {
                const inner = elementKind(kind);
                if (element !== undefined || inner === undefined) {
                    throw new ConfigurationError(`'${DIVE}' needs a list field and may appear once`, fieldName);
                }
                this.assertNoParam(token, fieldName);
                element = { omitEmpty: false, rules: [] };
                current = element;
                shape = shapeOfKind(inner);
                continue;
            }

            if (token.tag === OMIT_EMPTY) {
                this.assertNoParam(token, fieldName);
                current.omitEmpty = true;
                continue;
            }

            if (this.groups.has(token.tag)) {
                this.assertNoParam(token, fieldName);
                groups.push(token.tag);
                continue;
            }

            current.rules.push(this.compileRule(token, shape, fieldName));
        }

        return element === undefined ? { groups, field } : { groups, field, element };
    }

    /**
     * Message for a field that is absent from the request altogether
     */
    requiredMessage(target: ValidationTarget): string {
        return this.render('required', { field: target.name, tag: 'required', shape: shapeOfKind(target.kind) });
    }

    /**
     * Validate a record. Fields scoped to other groups are skipped.
     *
     * @returns errors in target order; empty when the record is valid
     */
    validate(record: RecordReader, targets: readonly ValidationTarget[], group: string): ValidationError[] {
        const errors: ValidationError[] = [];

        for (const target of targets) {
            const value = record.read(target.name);
            if (value === undefined) {
                throw new ConfigurationError('not a field of the validated record', target.name);
            }
            this.validateField(target, value, group, errors);
        }

        return errors;
    }

    private validateField(target: ValidationTarget, value: FieldValue, group: string, errors: ValidationError[]): void {
        const { groups, field, element } = target.rules;

        if (groups.length > 0 && !groups.includes(group)) {
            return;
        }

        if (field.omitEmpty && isZero(value)) {
            return;
        }

        const failure = this.firstFailure(field, value, shapeOfKind(target.kind));
        if (failure) {
            errors.push(validationError(target.name, this.message(target.name, failure), stringifyValue(value)));
            return;
        }

        const innerKind = elementKind(target.kind);
        if (element === undefined || innerKind === undefined || !Array.isArray(value)) {
            return;
        }

        const items: readonly FieldValue[] = value;
        const innerShape = shapeOfKind(innerKind);

        for (const [index, item] of items.entries()) {
            if (element.omitEmpty && isZero(item)) {
                continue;
            }
            const inner = this.firstFailure(element, item, innerShape);
            if (inner) {
                const path = `${target.name}[${index}]`;
                const message = this.render(DIVE, {
                    field: path,
                    tag: DIVE,
                    shape: innerShape,
                    inner: this.message(path, inner),
                });
                errors.push(validationError(path, message, stringifyValue(item)));
            }
        }
    }

    private firstFailure(set: RuleSet, value: FieldValue, shape: ValueShape): RuleFailure | undefined {
        for (const rule of set.rules) {
            const definition = this.rules.get(rule.tag);
            if (definition && !definition.check(value, rule)) {
                return { rule, shape };
            }
        }
        return undefined;
    }

    private message(field: string, { rule, shape }: RuleFailure): string {
        return this.render(rule.tag, {
            field,
            tag: rule.tag,
            shape,
            param: rule.param,
            values: rule.values?.join(', '),
        });
    }

    private render(tag: string, context: MessageContext): string {
        return renderTemplate(resolveTemplate(this.messages, tag, context.shape), context);
    }

    private compileRule(token: RuleToken, shape: ValueShape, fieldName: string): Rule {
        const definition = this.rules.get(token.tag);
        if (!definition) {
            throw new ConfigurationError(`unknown validation rule '${token.tag}'`, fieldName);
        }

        if (definition.shapes && !definition.shapes.includes(shape)) {
            throw new ConfigurationError(`rule '${token.tag}' cannot check a ${shape} value`, fieldName);
        }

        const { tag, param } = token;

        switch (definition.param) {
            case 'none':
                this.assertNoParam(token, fieldName);
                return { tag };

            case 'number': {
                const limit = param === undefined ? null : parseLimit(param);
                if (param === undefined || limit === null) {
                    throw new ConfigurationError(`rule '${tag}' needs a numeric parameter`, fieldName);
                }
                return { tag, param, limit };
            }

            case 'list': {
                const values = param === undefined ? [] : parseList(param);
                if (param === undefined || values.length === 0) {
                    throw new ConfigurationError(`rule '${tag}' needs a list of values`, fieldName);
                }
                return { tag, param, values };
            }

            case 'text':
                if (param === undefined || param === '') {
                    throw new ConfigurationError(`rule '${tag}' needs a parameter`, fieldName);
                }
                return { tag, param };

            default:
                return param === undefined ? { tag } : { tag, param };
        }
    }

    private assertNoParam(token: RuleToken, fieldName: string): void {
        if (token.param !== undefined) {
            throw new ConfigurationError(`'${token.tag}' takes no parameter`, fieldName);
        }
    }

    private assertFreeTag(tag: string, rules: ReadonlyMap<string, RuleDefinition>, what: string): void {
        if (!TAG_PATTERN.test(tag)) {
            throw new ConfigurationError(`invalid ${what} tag`, tag);
        }
        if (tag === DIVE || tag === OMIT_EMPTY || rules.has(tag)) {
            throw new ConfigurationError(`${what} tag is already taken`, tag);
        }
    }

    private isKnownTag(tag: string): boolean {
        return tag === DIVE || tag === OMIT_EMPTY || this.rules.has(tag) || this.groups.has(tag);
    }
}
