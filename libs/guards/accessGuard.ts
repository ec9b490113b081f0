/**
 * Access Guard
 *
 * Two-stage gate in front of every protected operation:
 * 1. authenticateRequest → token to Principal (codec verify + store lookup)
 * 2. authorize → active / role requirements, active check always first
 *
 * Callers only ever see UNAUTHORIZED for a bad token. Whether it was
 * malformed, expired or orphaned by a deleted account is logged, not returned.
 */

import type { AccountRole, Principal } from '../accounts/account.js';
import { type CredentialStore, toAccountView } from '../accounts/store.js';
import type { TokenCodec } from '../crypto/tokenCodec.js';
import { logger } from '../logging/logger.js';
import { type Clock, systemClock } from '../time/clock.js';

export type AccessRequirement =
    | { readonly kind: 'active' }
    | { readonly kind: 'role'; readonly role: AccountRole };

export const requireActive: AccessRequirement = Object.freeze({ kind: 'active' });

export function requireRole(role: AccountRole): AccessRequirement {
    return Object.freeze({ kind: 'role', role });
}

export type AccessDenyReason = 'UNAUTHORIZED' | 'FORBIDDEN';

/**
 * Internal-only detail of a denial, for logs.
 */
export type AccessDenyDetail =
    | 'MALFORMED'
    | 'EXPIRED'
    | 'ORPHANED'
    | 'NO_PRINCIPAL'
    | 'INACTIVE'
    | 'ROLE_MISMATCH';

export type AccessResult =
    | { success: true; principal: Principal }
    | { success: false; reason: 'UNAUTHORIZED' }
    | { success: false; reason: 'FORBIDDEN'; detail: 'INACTIVE' | 'ROLE_MISMATCH' };

export interface AccessGuardDeps {
    readonly codec: TokenCodec;
    readonly store: CredentialStore;
    readonly clock?: Clock;
}

const EVALUATION_ORDER: Record<AccessRequirement['kind'], number> = {
    active: 0,
    role: 1
};

export class AccessGuard {
    private readonly codec: TokenCodec;
    private readonly store: CredentialStore;
    private readonly clock: Clock;

    constructor(deps: AccessGuardDeps) {
        this.codec = deps.codec;
        this.store = deps.store;
        this.clock = deps.clock ?? systemClock;
    }

    public async authenticateRequest(token: string): Promise<AccessResult> {
        const verified = await this.codec.verify(token, this.clock());
        if (!verified.success) {
            logDenial('UNAUTHORIZED', verified.reason);
            return { success: false, reason: 'UNAUTHORIZED' };
        }

        const record = this.store.getByUsername(verified.subject);
        if (!record) {
            logDenial('UNAUTHORIZED', 'ORPHANED', { subject: verified.subject });
            return { success: false, reason: 'UNAUTHORIZED' };
        }

        return { success: true, principal: toAccountView(record) };
    }

    /**
     * Requirements are evaluated active-first whatever order they are declared in,
     * so an inactive admin is rejected for inactivity, not for permission.
     */
    public authorize(
        principal: Principal | undefined,
        requirements: readonly AccessRequirement[]
    ): AccessResult {
        if (!principal) {
            logDenial('UNAUTHORIZED', 'NO_PRINCIPAL');
            return { success: false, reason: 'UNAUTHORIZED' };
        }

        const ordered = [...requirements].sort((a, b) => EVALUATION_ORDER[a.kind] - EVALUATION_ORDER[b.kind]);

        for (const requirement of ordered) {
            if (requirement.kind === 'active' && !principal.isActive) {
                logDenial('FORBIDDEN', 'INACTIVE', { accountId: principal.id });
                return { success: false, reason: 'FORBIDDEN', detail: 'INACTIVE' };
            }
            if (requirement.kind === 'role' && principal.role !== requirement.role) {
                logDenial('FORBIDDEN', 'ROLE_MISMATCH', {
                    accountId: principal.id,
                    role: principal.role,
                    requiredRole: requirement.role
                });
                return { success: false, reason: 'FORBIDDEN', detail: 'ROLE_MISMATCH' };
            }
        }

        logger.debug({ accountId: principal.id, requirements: ordered.map(r => r.kind) }, 'Access guard passed');
        return { success: true, principal };
    }

    /**
     * authenticateRequest followed by authorize.
     */
    public async check(token: string, requirements: readonly AccessRequirement[]): Promise<AccessResult> {
        const authenticated = await this.authenticateRequest(token);
        if (!authenticated.success) {
            return authenticated;
        }
        return this.authorize(authenticated.principal, requirements);
    }
}

function logDenial(
    reason: AccessDenyReason,
    detail: AccessDenyDetail,
    context: Record<string, unknown> = {}
): void {
    logger.warn({ ...context, reason, detail }, 'Access guard denied request');
}
