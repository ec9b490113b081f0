import type { Request, Response, NextFunction } from 'express';
import { RequestContext } from '../context/requestContext.js';
import { forbidden, unauthorized, type HttpError } from '../errors/httpErrors.js';
import type { AccessGuard, AccessRequirement, AccessResult } from '../guards/accessGuard.js';

/**
 * Extract the credential from `Authorization: Bearer <token>`.
 */
export function extractBearerToken(req: Request): string | undefined {
    const authHeader = req.headers['authorization'];
    if (!authHeader) {
        return undefined;
    }

    const [scheme, token] = authHeader.trim().split(/\s+/, 2);
    if (scheme?.toLowerCase() !== 'bearer' || !token) {
        return undefined;
    }
    return token;
}

/**
 * Translate a guard denial into its transport error.
 */
export function accessDenied(result: Exclude<AccessResult, { success: true }>): HttpError {
    if (result.reason === 'UNAUTHORIZED') {
        return unauthorized();
    }
    return result.detail === 'INACTIVE' ? forbidden('Inactive user') : forbidden();
}

/**
 * Express middleware that resolves the bearer token to a Principal, applies
 * the route's requirements and runs the rest of the chain inside the
 * principal's RequestContext scope.
 */
export function createAuthMiddleware(
    guard: AccessGuard,
    requirements: readonly AccessRequirement[]
): (req: Request, res: Response, next: NextFunction) => Promise<void> {
    return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
        const token = extractBearerToken(req);
        if (!token) {
            next(unauthorized('Not authenticated'));
            return;
        }

        try {
            const result = await guard.check(token, requirements);
            if (!result.success) {
                next(accessDenied(result));
                return;
            }

            RequestContext.run(result.principal, () => next());
        } catch (error) {
            next(error);
        }
    };
}
