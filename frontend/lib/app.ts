import type { ServerResponse } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import mime from 'mime-types';
import serveIndex from 'serve-index';
import { accessLog } from './access-log.js';
import type { ServerConfig } from './config.js';
import { handlePreflight, withCors } from './cors.js';
import { httpStatusOf } from './errors.js';
import { classifyRequestPath } from './paths.js';

const SUPPORTED_METHODS = new Set(['GET', 'HEAD']);

// Bare mime type, without the charset parameter `send` would append
function setContentType(res: ServerResponse, filePath: string): void {
    const type = mime.lookup(filePath);
    if (type) {
        res.setHeader('Content-Type', type);
    }
}

export function createApp(config: ServerConfig): Express {
    const app = express();
    const { rootDir } = config;

    app.disable('x-powered-by');

    if (config.logRequests) {
        app.use(accessLog);
    }

    const files = express.Router();

    files.use(handlePreflight);

    files.use((req: Request, res: Response, next: NextFunction) => {
        if (!SUPPORTED_METHODS.has(req.method)) {
            res.status(501).type('text').send(`Unsupported method ('${req.method}')`);
            return;
        }
        next();
    });

    files.use((req: Request, res: Response, next: NextFunction) => {
        const kind = classifyRequestPath(rootDir, req.path);
        if (kind === 'malformed') {
            res.status(400).type('text').send('Bad request');
            return;
        }
        if (kind === 'outside') {
            res.status(404).type('text').send('File not found');
            return;
        }
        next();
    });

    files.use(
        express.static(rootDir, {
            dotfiles: 'allow',
            index: ['index.html', 'index.htm'],
            setHeaders: setContentType,
        }),
    );
    files.use(serveIndex(rootDir, { hidden: true, icons: false }));

    files.use((_req: Request, res: Response) => {
        res.status(404).type('text').send('File not found');
    });

    files.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(err);
            return;
        }
        const status = httpStatusOf(err);
        if (status >= 500) {
            console.error(`Error serving ${req.method} ${req.originalUrl}:`, err);
        }
        res.status(status).type('text').send(status === 404 ? 'File not found' : `Error ${status}`);
    });

    app.use(withCors(files));

    return app;
}
