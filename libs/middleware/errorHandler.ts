import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { HttpError, ValidationError } from '../errors/httpErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';

interface BodyParserError {
    readonly status: number;
    readonly type: string;
    readonly message: string;
}

/**
 * Client errors raised by express's body parsers (bad JSON, oversized body).
 */
export function isBodyParserError(err: unknown): err is BodyParserError {
    if (typeof err !== 'object' || err === null) return false;
    if (!('status' in err) || !('type' in err) || !('message' in err)) return false;
    return typeof err.status === 'number'
        && err.status >= 400
        && err.status < 500
        && typeof err.type === 'string'
        && typeof err.message === 'string';
}

/**
 * Final error middleware. Renders `{ detail }` for known client errors and
 * hides anything else behind a sanitized incident.
 */
export function createErrorHandler(): ErrorRequestHandler {
    return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
        if (res.headersSent) {
            next(err);
            return;
        }

        if (err instanceof ValidationError) {
            res.status(err.statusCode).json({ detail: err.issues });
            return;
        }

        if (err instanceof HttpError) {
            res.set(err.headers).status(err.statusCode).json({ detail: err.detail });
            return;
        }

        if (isBodyParserError(err)) {
            res.status(err.status).json({ detail: err.message });
            return;
        }

        const sanitized = ErrorSanitizer.sanitize(err, `${req.method} ${req.path}`);
        res.status(500).json({ detail: sanitized.publicMessage, incident_id: sanitized.incidentId });
    };
}
