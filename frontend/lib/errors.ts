export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * The listener could not be bound. Fatal at startup: there is no retry and no fallback port.
 */
export class BindError extends Error {
    readonly host: string;
    readonly port: number;
    readonly code: string | undefined;

    constructor(host: string, port: number, cause: NodeJS.ErrnoException) {
        const reason = cause.code === 'EADDRINUSE' ? 'address already in use' : cause.message;
        super(`Cannot bind ${host}:${port}: ${reason}`, { cause });
        this.name = 'BindError';
        this.host = host;
        this.port = port;
        this.code = cause.code;
    }
}

const BIND_ERROR_CODES = new Set(['EADDRINUSE', 'EACCES', 'EADDRNOTAVAIL']);

export function isBindFailure(err: NodeJS.ErrnoException): boolean {
    return err.code !== undefined && BIND_ERROR_CODES.has(err.code);
}

/**
 * HTTP status carried by an error from the Express stack (http-errors sets both `status` and `statusCode`).
 * Anything else is a 500.
 */
export function httpStatusOf(err: unknown): number {
    if (typeof err === 'object' && err !== null) {
        const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
        if (typeof status === 'number' && Number.isInteger(status) && status >= 400 && status <= 599) {
            return status;
        }
    }
    return 500;
}
