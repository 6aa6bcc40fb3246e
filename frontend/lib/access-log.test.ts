import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import request from 'supertest';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { formatAccessLogLine, formatLogDate } from './access-log.js';
import { createApp } from './app.js';
import { resolveServerConfig } from './config.js';

const DATE = new Date(Date.UTC(2026, 9, 18, 9, 5, 3));

describe('formatLogDate', () => {
    it('formats as DD/Mon/YYYY HH:MM:SS in UTC', () => {
        expect(formatLogDate(DATE)).toBe('18/Oct/2026 09:05:03');
    });
});

describe('formatAccessLogLine', () => {
    it('writes the request line and status', () => {
        const line = formatAccessLogLine(
            { remoteAddress: '::ffff:127.0.0.1', method: 'GET', url: '/index.html', httpVersion: '1.1', status: 200 },
            DATE,
        );
        expect(line).toBe('127.0.0.1 - - [18/Oct/2026 09:05:03] "GET /index.html HTTP/1.1" 200 -');
    });

    it('uses - for an unknown remote address', () => {
        const line = formatAccessLogLine(
            { remoteAddress: undefined, method: 'OPTIONS', url: '/x', httpVersion: '1.0', status: 200 },
            DATE,
        );
        expect(line).toBe('- - - [18/Oct/2026 09:05:03] "OPTIONS /x HTTP/1.0" 200 -');
    });
});

describe('request logging', () => {
    let tmpDir: string;

    beforeAll(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cors-log-test-'));
        await fs.writeFile(path.join(tmpDir, 'index.html'), '<html>ok</html>');
    });

    afterAll(async () => {
        await fs.remove(tmpDir);
    });

    it('logs one line per request when enabled', async () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        try {
            const app = createApp(resolveServerConfig({ rootDir: tmpDir, logRequests: true }));
            await request(app).get('/missing.html');
            await vi.waitFor(() => expect(log).toHaveBeenCalledTimes(1));
            expect(log.mock.calls[0][0]).toMatch(/ - - \[[^\]]+\] "GET \/missing\.html HTTP\/1\.1" 404 -$/);
        } finally {
            log.mockRestore();
        }
    });

    it('stays quiet when disabled', async () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        try {
            const app = createApp(resolveServerConfig({ rootDir: tmpDir }));
            await request(app).get('/index.html');
            expect(log).not.toHaveBeenCalled();
        } finally {
            log.mockRestore();
        }
    });
});
