/**
 * Credential Store
 *
 * In-memory registry of accounts with unique usernames and emails.
 *
 * Every mutation (register, update, delete) and the id counter sit behind one
 * exclusive lock held for the whole operation, so two concurrent registrations
 * can never both observe the same username as free. Reads are synchronous and
 * see the state either before or after a mutation, never in between.
 */

import { ExclusiveLock } from '../concurrency/exclusiveLock.js';
import type { PasswordHasher } from '../crypto/passwordHasher.js';
import { logger } from '../logging/logger.js';
import { type Clock, systemClock } from '../time/clock.js';
import {
    MIN_PASSWORD_LENGTH,
    type Account,
    type AccountChanges,
    type AccountRecord,
    type AuthenticationResult,
    type RegisterAccountInput,
    type RegistrationResult,
    type UpdateResult
} from './account.js';

/**
 * Map a stored record to its response-facing view.
 * Fields are copied explicitly so the digest can never ride along.
 */
export function toAccountView(record: AccountRecord): Account {
    return Object.freeze({
        id: record.id,
        username: record.username,
        email: record.email,
        fullName: record.fullName,
        role: record.role,
        isActive: record.isActive,
        createdAt: record.createdAt,
        updatedAt: record.updatedAt
    });
}

function clampIndex(value: number): number {
    return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0;
}

export class CredentialStore {
    private records: AccountRecord[] = [];
    private nextId = 1;
    private readonly lock = new ExclusiveLock();

    constructor(
        private readonly hasher: PasswordHasher,
        private readonly clock: Clock = systemClock
    ) { }

    /**
     * Create an account.
     *
     * Check order is fixed: password policy, username, email. When both the
     * username and the email collide the reported reason is DUPLICATE_USERNAME.
     */
    public async register(input: RegisterAccountInput): Promise<RegistrationResult> {
        if ([...input.password].length < MIN_PASSWORD_LENGTH) {
            logger.info({ username: input.username }, 'Registration rejected: weak password');
            return { success: false, reason: 'WEAK_PASSWORD' };
        }

        return this.lock.runExclusive(async (): Promise<RegistrationResult> => {
            if (this.getByUsername(input.username)) {
                logger.info({ username: input.username }, 'Registration rejected: duplicate username');
                return { success: false, reason: 'DUPLICATE_USERNAME' };
            }
            if (this.getByEmail(input.email)) {
                logger.info({ username: input.username }, 'Registration rejected: duplicate email');
                return { success: false, reason: 'DUPLICATE_EMAIL' };
            }

            const passwordHash = await this.hasher.hash(input.password);
            const record: AccountRecord = Object.freeze({
                id: this.nextId,
                username: input.username,
                email: input.email,
                fullName: input.fullName ?? null,
                role: input.role ?? 'user',
                isActive: input.isActive ?? true,
                passwordHash,
                createdAt: this.clock(),
                updatedAt: null
            });

            this.records.push(record);
            this.nextId += 1;

            logger.info({ accountId: record.id, username: record.username, role: record.role }, 'Account registered');
            return { success: true, account: toAccountView(record) };
        });
    }

    /**
     * The only operation that hands out the hash-bearing record.
     */
    public async authenticate(username: string, password: string): Promise<AuthenticationResult> {
        const record = this.getByUsername(username);
        if (!record) {
            return { success: false, reason: 'NOT_FOUND' };
        }

        const matches = await this.hasher.verify(password, record.passwordHash);
        if (!matches) {
            return { success: false, reason: 'BAD_PASSWORD' };
        }

        return { success: true, record };
    }

    public getById(id: number): Account | undefined {
        const record = this.records.find(r => r.id === id);
        return record ? toAccountView(record) : undefined;
    }

    /**
     * Internal lookup (uniqueness checks, authentication, token resolution).
     */
    public getByUsername(username: string): AccountRecord | undefined {
        return this.records.find(r => r.username === username);
    }

    /**
     * Internal lookup for email uniqueness checks.
     */
    public getByEmail(email: string): AccountRecord | undefined {
        return this.records.find(r => r.email === email);
    }

    /**
     * Accounts in creation order. Out-of-range bounds yield an empty page.
     */
    public list(skip: number, limit: number): Account[] {
        const start = clampIndex(skip);
        const count = clampIndex(limit);
        return this.records.slice(start, start + count).map(toAccountView);
    }

    public get size(): number {
        return this.records.length;
    }

    public async update(id: number, changes: AccountChanges): Promise<UpdateResult> {
        return this.lock.runExclusive((): UpdateResult => {
            const index = this.records.findIndex(r => r.id === id);
            if (index === -1) {
                return { success: false, reason: 'NOT_FOUND' };
            }

            const current = this.records[index];
            if (changes.email !== undefined && changes.email !== current.email) {
                const holder = this.getByEmail(changes.email);
                if (holder) {
                    logger.info({ accountId: id }, 'Account update rejected: duplicate email');
                    return { success: false, reason: 'DUPLICATE_EMAIL' };
                }
            }

            const now = this.clock();
            const updated: AccountRecord = Object.freeze({
                ...current,
                ...(changes.email !== undefined ? { email: changes.email } : {}),
                ...(changes.fullName !== undefined ? { fullName: changes.fullName } : {}),
                ...(changes.role !== undefined ? { role: changes.role } : {}),
                ...(changes.isActive !== undefined ? { isActive: changes.isActive } : {}),
                updatedAt: now.getTime() < current.createdAt.getTime() ? current.createdAt : now
            });
            this.records[index] = updated;

            logger.info({ accountId: id, fields: Object.keys(changes) }, 'Account updated');
            return { success: true, account: toAccountView(updated) };
        });
    }

    /**
     * Remove an account. Its id is never handed out again.
     */
    public async delete(id: number): Promise<boolean> {
        return this.lock.runExclusive((): boolean => {
            const index = this.records.findIndex(r => r.id === id);
            if (index === -1) {
                return false;
            }

            this.records.splice(index, 1);
            logger.info({ accountId: id }, 'Account deleted');
            return true;
        });
    }
}
