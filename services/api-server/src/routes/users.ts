import { Router } from 'express';
import type { CredentialStore } from '../../../../libs/accounts/store.js';
import { RequestContext } from '../../../../libs/context/requestContext.js';
import { forbidden, notFound } from '../../../../libs/errors/httpErrors.js';
import { type AccessGuard, requireActive, requireRole } from '../../../../libs/guards/accessGuard.js';
import { getContextLogger } from '../../../../libs/logging/logger.js';
import { asyncHandler } from '../../../../libs/middleware/asyncHandler.js';
import { createAuthMiddleware } from '../../../../libs/middleware/authenticate.js';
import { validate } from '../../../../libs/validation/zod-middleware.js';
import {
    CreateAccountRequestSchema,
    IdParamSchema,
    PaginationQuerySchema,
    UpdateAccountRequestSchema
} from '../../../../libs/validation/schema.js';
import { registrationFailure, updateFailure } from '../failures.js';
import { toAccountResponse } from '../presenters.js';

export interface UserRouteDeps {
    readonly store: CredentialStore;
    readonly guard: AccessGuard;
}

export function createUserRouter(deps: UserRouteDeps): Router {
    const router = Router();
    const activeOnly = createAuthMiddleware(deps.guard, [requireActive]);
    const adminOnly = createAuthMiddleware(deps.guard, [requireActive, requireRole('admin')]);

    router.get('/', activeOnly, (req, res) => {
        const { skip, limit } = validate(PaginationQuerySchema, req.query, 'Users:List');
        res.json(deps.store.list(skip, limit).map(toAccountResponse));
    });

    router.get('/:id', activeOnly, (req, res) => {
        const { id } = validate(IdParamSchema, req.params, 'Users:Get');
        const account = deps.store.getById(id);
        if (!account) {
            throw notFound('User not found');
        }
        res.json(toAccountResponse(account));
    });

    router.post('/', adminOnly, asyncHandler(async (req, res) => {
        const input = validate(CreateAccountRequestSchema, req.body, 'Users:Create');

        const result = await deps.store.register({
            username: input.username,
            email: input.email,
            password: input.password,
            fullName: input.full_name ?? null,
            role: input.role,
            isActive: input.is_active,
        });
        if (!result.success) {
            throw registrationFailure(result.reason);
        }

        getContextLogger(RequestContext.get()).info({ createdAccountId: result.account.id }, 'Account created by admin');
        res.json(toAccountResponse(result.account));
    }));

    // Accounts may edit their own profile; only admins edit others or change role/activation
    router.put('/:id', activeOnly, asyncHandler(async (req, res) => {
        const { id } = validate(IdParamSchema, req.params, 'Users:Update');
        const changes = validate(UpdateAccountRequestSchema, req.body, 'Users:Update');
        const principal = RequestContext.get();
        const isAdmin = principal.role === 'admin';

        if (!isAdmin && principal.id !== id) {
            throw forbidden();
        }
        if (!isAdmin && (changes.role !== undefined || changes.is_active !== undefined)) {
            throw forbidden();
        }

        const result = await deps.store.update(id, {
            email: changes.email,
            fullName: changes.full_name,
            role: changes.role,
            isActive: changes.is_active,
        });
        if (!result.success) {
            throw updateFailure(result.reason);
        }

        res.json(toAccountResponse(result.account));
    }));

    router.delete('/:id', adminOnly, asyncHandler(async (req, res) => {
        const { id } = validate(IdParamSchema, req.params, 'Users:Delete');

        const deleted = await deps.store.delete(id);
        if (!deleted) {
            throw notFound('User not found');
        }

        getContextLogger(RequestContext.get()).info({ deletedAccountId: id }, 'Account deleted by admin');
        res.json({ message: 'User deleted successfully' });
    }));

    return router;
}
