import { describe, it, expect } from 'vitest';
import { DEFAULT_PORT, readServerConfig } from '@src/lib/config.js';
import { ConfigurationError } from '@src/lib/errors/configuration-error.js';

describe('readServerConfig', () => {
    it('falls back to defaults for an empty environment', () => {
        expect(readServerConfig({})).toEqual({ port: DEFAULT_PORT, nodeEnv: 'development', logLevel: 'info' });
    });

    it('reads port, environment and log level', () => {
        expect(readServerConfig({ PORT: '3000', NODE_ENV: 'production', LOG_LEVEL: 'WARN' })).toEqual({
            port: 3000,
            nodeEnv: 'production',
            logLevel: 'warn',
        });
    });

    it('rejects a port that is not a number in range', () => {
        expect(() => readServerConfig({ PORT: 'http' })).toThrow(ConfigurationError);
        expect(() => readServerConfig({ PORT: '70000' })).toThrow("PORT: '70000' is not a valid port");
        expect(() => readServerConfig({ PORT: '0' })).toThrow("PORT: '0' is not a valid port");
    });

    it('reads the log level the same way the logger does', () => {
        expect(readServerConfig({ LOG_LEVEL: ' debug ' }).logLevel).toBe('debug');
    });

    it('rejects an unknown log level', () => {
        expect(() => readServerConfig({ LOG_LEVEL: 'verbose' })).toThrow("LOG_LEVEL: 'verbose' is not a log level");
    });
});
