import path from 'node:path';
import { ConfigError } from './errors.js';

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '0.0.0.0';

export interface ServerConfig {
    rootDir: string;
    port: number;
    host: string;
    logRequests: boolean;
}

export interface ServerOptions {
    rootDir: string;
    port?: number;
    host?: string;
    logRequests?: boolean;
}

export function resolveServerConfig(options: ServerOptions): ServerConfig {
    if (!options.rootDir) {
        throw new ConfigError('A root directory is required');
    }

    const port = options.port ?? DEFAULT_PORT;
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ConfigError(`Invalid port: ${port}`);
    }

    return {
        rootDir: path.resolve(options.rootDir),
        port,
        host: options.host ?? DEFAULT_HOST,
        logRequests: options.logRequests ?? false,
    };
}
