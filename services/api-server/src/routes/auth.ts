import { Router } from 'express';
import type { CredentialStore } from '../../../../libs/accounts/store.js';
import { RequestContext } from '../../../../libs/context/requestContext.js';
import type { TokenCodec } from '../../../../libs/crypto/tokenCodec.js';
import { unauthorized } from '../../../../libs/errors/httpErrors.js';
import { type AccessGuard, requireActive } from '../../../../libs/guards/accessGuard.js';
import { getContextLogger, logger } from '../../../../libs/logging/logger.js';
import { asyncHandler } from '../../../../libs/middleware/asyncHandler.js';
import { createAuthMiddleware } from '../../../../libs/middleware/authenticate.js';
import type { Clock } from '../../../../libs/time/clock.js';
import { validate } from '../../../../libs/validation/zod-middleware.js';
import { LoginRequestSchema, RegisterRequestSchema } from '../../../../libs/validation/schema.js';
import { registrationFailure } from '../failures.js';
import { type TokenResponse, toAccountResponse } from '../presenters.js';

export interface AuthRouteDeps {
    readonly store: CredentialStore;
    readonly codec: TokenCodec;
    readonly guard: AccessGuard;
    readonly clock: Clock;
    readonly accessTokenTtlMinutes: number;
}

export function createAuthRouter(deps: AuthRouteDeps): Router {
    const router = Router();

    // Accepts an OAuth2 password form or the same fields as JSON
    router.post('/token', asyncHandler(async (req, res) => {
        const { username, password } = validate(LoginRequestSchema, req.body, 'Auth:Login');

        const result = await deps.store.authenticate(username, password);
        if (!result.success) {
            logger.warn({ username, reason: result.reason }, 'Login failed');
            throw unauthorized('Incorrect username or password');
        }

        const accessToken = await deps.codec.issue(
            result.record.username,
            deps.clock(),
            deps.accessTokenTtlMinutes * 60
        );

        logger.info({ accountId: result.record.id }, 'Access token issued');
        const body: TokenResponse = { access_token: accessToken, token_type: 'bearer' };
        res.json(body);
    }));

    // Public registration always yields an active account with the user role
    router.post('/register', asyncHandler(async (req, res) => {
        const input = validate(RegisterRequestSchema, req.body, 'Auth:Register');

        const result = await deps.store.register({
            username: input.username,
            email: input.email,
            password: input.password,
            fullName: input.full_name ?? null,
        });
        if (!result.success) {
            throw registrationFailure(result.reason);
        }

        res.json(toAccountResponse(result.account));
    }));

    router.get('/me', createAuthMiddleware(deps.guard, [requireActive]), (_req, res) => {
        const principal = RequestContext.get();
        getContextLogger(principal).debug('Profile read');
        res.json(toAccountResponse(principal));
    });

    return router;
}
