/**
 * Source Reader
 *
 * The three origins a field value can come from. Query and path values are
 * looked up one field at a time as text; the body is decoded once as a whole
 * by the transport and its fields are handed over already materialised.
 */

export type SourceKind = 'body' | 'query' | 'path';

export const SOURCE_KINDS: readonly SourceKind[] = ['body', 'query', 'path'];

/**
 * Result of a text lookup. `present: false` is distinct from a present
 * empty string (`?rating=`).
 */
export type RawValue = { present: false } | { present: true; text: string };

export type ParamLookup = (key: string) => RawValue;

/**
 * Result of reading any source: text for query/path, a decoded value for body
 */
export type SourceValue =
    | { present: false }
    | { present: true; form: 'text'; text: string }
    | { present: true; form: 'decoded'; value: unknown };

export interface RequestSources {
    /** Decoded request payload, undefined when the request had no body */
    body?: Readonly<Record<string, unknown>>;
    query: ParamLookup;
    path: ParamLookup;
}

export const ABSENT: { present: false } = { present: false };

export function isSourceKind(value: string): value is SourceKind {
    return SOURCE_KINDS.some(kind => kind === value);
}

/**
 * Read one key from a decoded body. `null` counts as absent, the same as a
 * missing key.
 */
export function readBody(body: Readonly<Record<string, unknown>> | undefined, key: string): SourceValue {
    if (body === undefined || !Object.hasOwn(body, key)) {
        return ABSENT;
    }
    const value = body[key];
    if (value === null || value === undefined) {
        return ABSENT;
    }
    return { present: true, form: 'decoded', value };
}

function fromRaw(raw: RawValue): SourceValue {
    return raw.present ? { present: true, form: 'text', text: raw.text } : ABSENT;
}

/**
 * Dispatch a lookup on the source tag
 */
export function readSource(sources: RequestSources, source: SourceKind, key: string): SourceValue {
    switch (source) {
        case 'body':
            return readBody(sources.body, key);
        case 'query':
            return fromRaw(sources.query(key));
        case 'path':
            return fromRaw(sources.path(key));
    }
}

// ===========================
// Lookup builders
// ===========================

export function lookupFromRecord(params: Readonly<Record<string, string | undefined>>): ParamLookup {
    return key => {
        const text = Object.hasOwn(params, key) ? params[key] : undefined;
        return text === undefined ? ABSENT : { present: true, text };
    };
}

/**
 * Single-value lookup over a query string: the first occurrence wins and
 * bracket notation gets no special treatment.
 */
export function lookupFromSearchParams(params: URLSearchParams): ParamLookup {
    return key => {
        const text = params.get(key);
        return text === null ? ABSENT : { present: true, text };
    };
}

export const NO_PARAMS: ParamLookup = () => ABSENT;

/**
 * Sources for callers outside HTTP (tests, scripts)
 */
export function createSources(input: {
    body?: Readonly<Record<string, unknown>>;
    query?: Readonly<Record<string, string | undefined>> | URLSearchParams;
    path?: Readonly<Record<string, string | undefined>>;
}): RequestSources {
    const query = input.query instanceof URLSearchParams
        ? lookupFromSearchParams(input.query)
        : input.query ? lookupFromRecord(input.query) : NO_PARAMS;

    return {
        body: input.body,
        query,
        path: input.path ? lookupFromRecord(input.path) : NO_PARAMS,
    };
}
