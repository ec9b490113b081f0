/**
 * Account Identity Model
 *
 * Accounts are owned exclusively by the CredentialStore. Everything that
 * leaves the store is an `Account` view; the hash-bearing `AccountRecord`
 * only reaches the login path.
 */

export const ACCOUNT_ROLES = ['admin', 'user', 'moderator'] as const;

/**
 * Closed privilege tiers.
 */
export type AccountRole = typeof ACCOUNT_ROLES[number];

export const MIN_PASSWORD_LENGTH = 6;

/**
 * Response-facing account view. Never carries the password digest.
 */
export interface Account {
    /** Monotonically assigned, never reused */
    readonly id: number;
    /** Unique, case-sensitive, immutable */
    readonly username: string;
    /** Unique, case-sensitive */
    readonly email: string;
    readonly fullName: string | null;
    readonly role: AccountRole;
    readonly isActive: boolean;
    readonly createdAt: Date;
    /** Set on every mutation, never earlier than createdAt */
    readonly updatedAt: Date | null;
}

/**
 * Stored account including the password digest (internal use only).
 */
export interface AccountRecord extends Account {
    readonly passwordHash: string;
}

/**
 * The account resolved from a verified token for one request.
 */
export type Principal = Readonly<Account>;

export interface RegisterAccountInput {
    readonly username: string;
    readonly email: string;
    readonly password: string;
    readonly fullName?: string | null;
    readonly role?: AccountRole;
    readonly isActive?: boolean;
}

/**
 * Partial update: absent fields are left untouched, `fullName: null` clears it.
 */
export interface AccountChanges {
    readonly email?: string;
    readonly fullName?: string | null;
    readonly role?: AccountRole;
    readonly isActive?: boolean;
}

export type RegistrationFailure = 'WEAK_PASSWORD' | 'DUPLICATE_USERNAME' | 'DUPLICATE_EMAIL';
export type AuthenticationFailure = 'NOT_FOUND' | 'BAD_PASSWORD';
export type UpdateFailure = 'NOT_FOUND' | 'DUPLICATE_EMAIL';

export type RegistrationResult =
    | { success: true; account: Account }
    | { success: false; reason: RegistrationFailure };

export type AuthenticationResult =
    | { success: true; record: AccountRecord }
    | { success: false; reason: AuthenticationFailure };

export type UpdateResult =
    | { success: true; account: Account }
    | { success: false; reason: UpdateFailure };
