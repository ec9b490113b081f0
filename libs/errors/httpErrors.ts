/**
 * Transport-level errors.
 *
 * The core never produces these: account, token and guard operations return
 * typed results, and only the HTTP layer turns a failure reason into one of
 * the errors below.
 */

export class HttpError extends Error {
    constructor(
        readonly statusCode: number,
        readonly detail: string,
        readonly headers: Readonly<Record<string, string>> = {}
    ) {
        super(detail);
        this.name = 'HttpError';
    }
}

export interface ValidationIssue {
    readonly loc: string;
    readonly msg: string;
}

/**
 * Error thrown when a request body or query fails schema validation
 */
export class ValidationError extends HttpError {
    readonly code = 'VALIDATION_FAILED';

    constructor(
        readonly context: string,
        readonly issues: readonly ValidationIssue[]
    ) {
        super(422, `Validation failed in ${context}`);
        this.name = 'ValidationError';
    }
}

export const unauthorized = (detail = 'Could not validate credentials'): HttpError =>
    new HttpError(401, detail, { 'WWW-Authenticate': 'Bearer' });

export const forbidden = (detail = 'Not enough permissions'): HttpError =>
    new HttpError(403, detail);

export const notFound = (detail: string): HttpError => new HttpError(404, detail);

export const badRequest = (detail: string): HttpError => new HttpError(400, detail);
