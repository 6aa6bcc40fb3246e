import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_HOST, DEFAULT_PORT, resolveServerConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('resolveServerConfig', () => {
    it('fills in defaults', () => {
        expect(resolveServerConfig({ rootDir: '/srv/www' })).toEqual({
            rootDir: '/srv/www',
            port: DEFAULT_PORT,
            host: DEFAULT_HOST,
            logRequests: false,
        });
        expect(DEFAULT_PORT).toBe(8000);
        expect(DEFAULT_HOST).toBe('0.0.0.0');
    });

    it('resolves a relative root against the working directory', () => {
        expect(resolveServerConfig({ rootDir: 'public' }).rootDir).toBe(path.resolve('public'));
    });

    it('accepts port 0', () => {
        expect(resolveServerConfig({ rootDir: '/srv/www', port: 0 }).port).toBe(0);
    });

    it.each([-1, 65536, 80.5, Number.NaN])('rejects port %s', (port) => {
        expect(() => resolveServerConfig({ rootDir: '/srv/www', port })).toThrow(ConfigError);
    });

    it('requires a root directory', () => {
        expect(() => resolveServerConfig({ rootDir: '' })).toThrow('A root directory is required');
    });
});
