import path from 'node:path';

export type RequestPathKind = 'ok' | 'outside' | 'malformed';

/**
 * Check a URL path against `rootDir` before the static handler resolves it.
 * `urlPath` is the raw (still percent-encoded) pathname, without the query string.
 */
export function classifyRequestPath(rootDir: string, urlPath: string): RequestPathKind {
    let decoded: string;
    try {
        decoded = decodeURIComponent(urlPath);
    } catch {
        return 'malformed';
    }

    if (decoded.includes('\0')) {
        return 'malformed';
    }

    const root = path.resolve(rootDir);
    const filePath = path.resolve(root, `.${path.posix.sep}${decoded}`);

    if (filePath !== root && !filePath.startsWith(root + path.sep)) {
        return 'outside';
    }

    return 'ok';
}
