import type { z } from 'zod';
import { ValidationError } from '../errors/httpErrors.js';
import { logger } from '../logging/logger.js';

/**
 * Validation Middleware
 * Parses untrusted input against a schema and throws a strictly typed
 * ValidationError on failure. Used for "Fail-Closed" ingress validation.
 */
export function validate<S extends z.ZodTypeAny>(schema: S, data: unknown, context: string): z.output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues = result.error.issues.map(e => ({
            loc: e.path.join('.'),
            msg: e.message
        }));

        // Issue paths and messages only; raw input may hold credentials
        logger.warn({ context, errors: issues }, "Input Validation Failure");

        throw new ValidationError(context, issues);
    }

    return result.data;
}
