import type { NextFunction, Request, Response } from 'express';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export interface AccessLogEntry {
    remoteAddress: string | undefined;
    method: string;
    url: string;
    httpVersion: string;
    status: number;
}

const pad = (n: number): string => String(n).padStart(2, '0');

// 18/Oct/2026 09:05:03, always UTC
export function formatLogDate(date: Date): string {
    const day = pad(date.getUTCDate());
    const month = MONTHS[date.getUTCMonth()];
    const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
    return `${day}/${month}/${date.getUTCFullYear()} ${time}`;
}

export function formatAccessLogLine(entry: AccessLogEntry, date: Date): string {
    const remote = (entry.remoteAddress || '-').replace(/^::ffff:/, '');
    const requestLine = `${entry.method} ${entry.url} HTTP/${entry.httpVersion}`;
    return `${remote} - - [${formatLogDate(date)}] "${requestLine}" ${entry.status} -`;
}

export function accessLog(req: Request, res: Response, next: NextFunction): void {
    res.on('finish', () => {
        console.log(
            formatAccessLogLine(
                {
                    remoteAddress: req.socket.remoteAddress,
                    method: req.method,
                    url: req.originalUrl,
                    httpVersion: req.httpVersion,
                    status: res.statusCode,
                },
                new Date(),
            ),
        );
    });
    next();
}
