import type http from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Express } from 'express';
import fs from 'fs-extra';
import { createApp } from './app.js';
import { resolveServerConfig, type ServerConfig, type ServerOptions } from './config.js';
import { BindError, ConfigError, isBindFailure } from './errors.js';

/**
 * A static file server rooted at one directory, with CORS headers on every response.
 *
 * Each instance owns its own Express app and listener, so several can run side by side in one process.
 */
export class StaticCorsServer {
    readonly config: ServerConfig;
    readonly app: Express;
    private server: http.Server | null = null;
    private starting: Promise<AddressInfo> | null = null;

    constructor(options: ServerOptions) {
        this.config = resolveServerConfig(options);
        this.app = createApp(this.config);
    }

    get rootDir(): string {
        return this.config.rootDir;
    }

    get port(): number {
        return this.config.port;
    }

    get address(): AddressInfo | null {
        const addr = this.server?.address();
        return addr && typeof addr !== 'string' ? addr : null;
    }

    get url(): string | null {
        const addr = this.address;
        return addr ? `http://localhost:${addr.port}` : null;
    }

    async start(): Promise<AddressInfo> {
        // Claimed before the first await, so overlapping calls cannot both bind
        if (this.server || this.starting) {
            throw new Error('Server already started');
        }

        this.starting = this.listen();
        try {
            return await this.starting;
        } finally {
            this.starting = null;
        }
    }

    private async listen(): Promise<AddressInfo> {
        const { rootDir, host, port } = this.config;
        if (!(await fs.pathExists(rootDir)) || !(await fs.stat(rootDir)).isDirectory()) {
            throw new ConfigError(`Root is not a directory: ${rootDir}`);
        }

        const server = await new Promise<http.Server>((resolve, reject) => {
            const listener = this.app.listen(port, host);
            const onError = (err: NodeJS.ErrnoException) => {
                listener.off('listening', onListening);
                reject(isBindFailure(err) ? new BindError(host, port, err) : err);
            };
            const onListening = () => {
                listener.off('error', onError);
                resolve(listener);
            };
            listener.once('error', onError);
            listener.once('listening', onListening);
        });

        this.server = server;
        const addr = server.address();
        if (!addr || typeof addr === 'string') {
            throw new Error('Failed to read server address');
        }
        return addr;
    }

    /**
     * Stops accepting connections and drops open ones, including responses still being written.
     */
    async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;
        this.server = null;

        await new Promise<void>((resolve, reject) => {
            server.close((err) => (err ? reject(err) : resolve()));
            server.closeAllConnections();
        });
    }
}
