import type { Context } from 'hono';
import { createValidResponse } from '@src/lib/api-helpers.js';
import type { FieldDescriptor } from '@src/lib/extraction/endpoint.js';
import type { AppEnv } from '@src/lib/types/app-env.js';

/**
 * POST /users - Validate a user creation request
 *
 * Body: { name, email, tags?, role?, active? }
 * Responds 201 with the accepted record.
 */
export const fields: readonly FieldDescriptor[] = [
    { name: 'Name', source: 'body', required: true, rules: 'required,min=3,max=50' },
    { name: 'Email', source: 'body', required: true, rules: 'required,email' },
    { name: 'Tags', source: 'body', rules: 'omitempty,unique,dive,min=2,max=20' },
    { name: 'Role', source: 'body', default: 'user', rules: 'in=user,admin,moderator' },
    { name: 'Active', source: 'body', default: 'true' },
];

export const group = 'create';

export default function (context: Context<AppEnv>) {
    return createValidResponse(context, context.get('validated'), 201);
}
