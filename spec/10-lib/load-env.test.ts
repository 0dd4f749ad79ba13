import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadEnv, parseLine } from '@src/lib/env/load-env.js';

describe('parseLine', () => {
    it('splits on the first equals sign', () => {
        expect(parseLine('URL=http://host/?a=b')).toEqual(['URL', 'http://host/?a=b']);
    });

    it('strips quotes and keeps hashes inside them', () => {
        expect(parseLine('A="x # y"')).toEqual(['A', 'x # y']);
        expect(parseLine("B='single'")).toEqual(['B', 'single']);
    });

    it('drops inline comments from unquoted values', () => {
        expect(parseLine('PORT=8080 # local')).toEqual(['PORT', '8080']);
    });

    it('skips blanks, comments and lines without a key', () => {
        expect(parseLine('')).toBeNull();
        expect(parseLine('# comment')).toBeNull();
        expect(parseLine('no-equals')).toBeNull();
        expect(parseLine('=value')).toBeNull();
    });
});

describe('loadEnv', () => {
    let dir: string;
    let path: string;

    beforeAll(() => {
        dir = mkdtempSync(join(tmpdir(), 'load-env-'));
        path = join(dir, '.env');
        writeFileSync(path, '# settings\nPORT=9000\nLOG_LEVEL=debug\n\nNODE_ENV="staging"\n');
    });

    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('loads every pair into the target environment', () => {
        const env: NodeJS.ProcessEnv = {};

        const result = loadEnv({ path, env });

        expect(result).toEqual({ loaded: ['PORT', 'LOG_LEVEL', 'NODE_ENV'], skipped: [] });
        expect(env).toEqual({ PORT: '9000', LOG_LEVEL: 'debug', NODE_ENV: 'staging' });
    });

    it('keeps existing values unless asked to override', () => {
        const env: NodeJS.ProcessEnv = { PORT: '1234' };

        expect(loadEnv({ path, env }).skipped).toEqual(['PORT']);
        expect(env.PORT).toBe('1234');

        loadEnv({ path, env, override: true });
        expect(env.PORT).toBe('9000');
    });

    it('does nothing when the file is missing', () => {
        const env: NodeJS.ProcessEnv = {};

        expect(loadEnv({ path: join(dir, 'missing.env'), env })).toEqual({ loaded: [], skipped: [] });
        expect(env).toEqual({});
    });
});
