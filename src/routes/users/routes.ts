/**
 * User Routes
 *
 * - Create: POST /users (group `create`)
 * - Update: PUT /users/:user_id (group `update`)
 */

export { default as UserCreate, fields as userCreateFields, group as userCreateGroup } from './POST.js';
export { default as UserUpdate, fields as userUpdateFields, group as userUpdateGroup } from './:user_id/PUT.js';
