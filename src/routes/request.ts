/**
 * User Request Record
 *
 * Shared by every /users and /search endpoint; each endpoint decides which
 * of these fields it reads, from where, and under which rules.
 */

import { defineRecord, field } from '@src/lib/field-types.js';

export const UserRequest = defineRecord({
    Name: field.string('name'),
    Email: field.string('email'),
    Tags: field.stringList('tags'),
    IDs: field.uintList('ids'),
    UserID: field.uint('user_id'),
    Rating: field.int('rating'),
    Role: field.string('role'),
    Active: field.bool('active'),
});
