import type { RequestHandler } from 'express';
import { logger } from '../logging/logger.js';

/**
 * One log line per request, written when the response finishes.
 * The query string is left out since it may carry user input.
 */
export function requestLogger(): RequestHandler {
    return (req, res, next) => {
        const startedAt = process.hrtime.bigint();

        res.on('finish', () => {
            const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
            const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
            logger[level]({
                method: req.method,
                path: req.originalUrl.split('?')[0],
                statusCode: res.statusCode,
                durationMs: Math.round(durationMs * 100) / 100
            }, 'Request completed');
        });

        next();
    };
}
