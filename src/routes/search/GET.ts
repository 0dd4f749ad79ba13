import type { Context } from 'hono';
import { createValidResponse } from '@src/lib/api-helpers.js';
import type { FieldDescriptor } from '@src/lib/extraction/endpoint.js';
import type { AppEnv } from '@src/lib/types/app-env.js';

/**
 * GET /search?tags=tech,sports&rating=4
 *
 * `tags` is a comma-separated list drawn from a fixed vocabulary; `rating`
 * defaults to 5.
 */
export const fields: readonly FieldDescriptor[] = [
    { name: 'Tags', source: 'query', required: true, rules: 'required,min=1,max=5,dive,in=tech,sports,politics' },
    { name: 'Rating', source: 'query', default: '5', rules: 'omitempty,min=1,max=5' },
];

export const group = 'search';

export default function (context: Context<AppEnv>) {
    return createValidResponse(context, context.get('validated'));
}
