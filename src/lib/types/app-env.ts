/**
 * Hono environment shared by the app, its middleware and route handlers
 */

import type { RecordReader } from '@src/lib/typed-record.js';

export interface AppVariables {
    /** Decoded JSON payload; undefined for requests without a body */
    parsedBody: Record<string, unknown> | undefined;
    /** Record accepted by the request validator */
    validated: RecordReader;
}

export interface AppEnv {
    Variables: AppVariables;
}
