/**
 * Rule Expression Parsing
 *
 * Rule expressions are the declarative `"required,min=3,max=50"` strings
 * attached to field descriptors. They are tokenised once, when an endpoint
 * is defined; requests only ever see the resulting RuleChain.
 */

/**
 * One rule with its parameter already interpreted for its definition
 */
export interface Rule {
    readonly tag: string;
    readonly param?: string;
    /** Numeric parameter (min, max) */
    readonly limit?: number;
    /** List parameter (in) */
    readonly values?: readonly string[];
}

export interface RuleSet {
    /** A zero value skips every rule of the set */
    readonly omitEmpty: boolean;
    readonly rules: readonly Rule[];
}

/**
 * Parsed form of one rule expression
 *
 * `field` applies to the value as a whole. `element`, present only after
 * `dive`, applies to each element of a list. `groups` holds the validation
 * groups the field is scoped to (empty: every group).
 */
export interface RuleChain {
    readonly groups: readonly string[];
    readonly field: RuleSet;
    readonly element?: RuleSet;
}

export const DIVE = 'dive';
export const OMIT_EMPTY = 'omitempty';

export interface RuleToken {
    tag: string;
    param?: string;
}

/**
 * Split a rule expression into tag/param tokens.
 *
 * Commas separate rules, so a list parameter such as `in=tech,sports` is
 * rebuilt here: a bare token following a list-taking rule is folded into its
 * parameter unless it names something on its own (a rule, keyword or group).
 *
 * @param takesList - whether a tag's parameter is a comma list
 * @param isKnownTag - whether a bare token names a rule, keyword or group
 */
export function tokenizeRules(
    expression: string,
    takesList: (tag: string) => boolean,
    isKnownTag: (tag: string) => boolean
): RuleToken[] {
    const tokens: RuleToken[] = [];
    let listToken: RuleToken | undefined;

    for (const piece of expression.split(',')) {
        const text = piece.trim();
        if (text === '') {
            continue;
        }

        const eqIndex = text.indexOf('=');

        if (eqIndex === -1 && listToken && !isKnownTag(text)) {
            listToken.param = `${listToken.param},${text}`;
            continue;
        }

        const token: RuleToken = eqIndex === -1
            ? { tag: text }
            : { tag: text.slice(0, eqIndex).trim(), param: text.slice(eqIndex + 1).trim() };

        tokens.push(token);
        listToken = token.param !== undefined && takesList(token.tag) ? token : undefined;
    }

    return tokens;
}

const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;

export function parseLimit(param: string): number | null {
    return NUMBER_PATTERN.test(param) ? Number(param) : null;
}

export function parseList(param: string): string[] {
    return param.split(',').map(value => value.trim()).filter(value => value !== '');
}
