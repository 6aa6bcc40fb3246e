import type { NextFunction, Request, RequestHandler, Response } from 'express';

export const CORS_HEADERS = {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Authorization, Content-Type, Accept',
} as const;

/**
 * Wraps a handler so that whatever response it produces, error pages included, carries the CORS headers.
 */
export function withCors(handler: RequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        res.set(CORS_HEADERS);
        handler(req, res, next);
    };
}

export function handlePreflight(req: Request, res: Response, next: NextFunction): void {
    if (req.method !== 'OPTIONS') {
        next();
        return;
    }
    res.status(200).set('Content-Length', '0').end();
}
