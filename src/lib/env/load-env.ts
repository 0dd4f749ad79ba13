/**
 * Environment Variable Loader
 *
 * Loads KEY=VALUE pairs from a .env file into process.env.
 *
 * Features:
 * - Supports comments (#) and empty lines
 * - Supports quoted values (single and double)
 * - Supports inline comments after unquoted values
 * - Does not override existing environment variables unless asked
 */

import { readFileSync, existsSync } from 'fs';

export interface LoadEnvOptions {
    /** Path to .env file (default: '.env') */
    path?: string;
    /** Override existing env vars (default: false) */
    override?: boolean;
    /** Target environment (default: process.env) */
    env?: NodeJS.ProcessEnv;
}

export interface LoadEnvResult {
    loaded: string[];
    skipped: string[];
}

/**
 * Parse a single line from .env file
 * Returns [key, value] tuple or null if line should be skipped
 */
export function parseLine(line: string): [string, string] | null {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
        return null;
    }

    // Find the first = sign
    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
        return null;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    if (!key) {
        return null;
    }

    if ((value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
        (value.startsWith("'") && value.endsWith("'") && value.length >= 2)) {
        value = value.slice(1, -1);
    } else {
        // Inline comments only apply to unquoted values
        const hashIndex = value.indexOf('#');
        if (hashIndex !== -1) {
            value = value.slice(0, hashIndex).trim();
        }
    }

    return [key, value];
}

/**
 * Load environment variables from a .env file. A missing file is not an
 * error: every setting has a default.
 */
export function loadEnv(options: LoadEnvOptions = {}): LoadEnvResult {
    const {
        path = '.env',
        override = false,
        env = process.env,
    } = options;

    const result: LoadEnvResult = { loaded: [], skipped: [] };

    if (!existsSync(path)) {
        return result;
    }

    const content = readFileSync(path, 'utf-8');

    for (const line of content.split('\n')) {
        const parsed = parseLine(line);
        if (!parsed) continue;

        const [key, value] = parsed;

        if (env[key] !== undefined && !override) {
            result.skipped.push(key);
            continue;
        }

        env[key] = value;
        result.loaded.push(key);
    }

    return result;
}
