/**
 * Public exports for the account module.
 */

// Types
export type {
    Account,
    AccountRecord,
    AccountRole,
    AccountChanges,
    Principal,
    RegisterAccountInput,
    RegistrationFailure,
    RegistrationResult,
    AuthenticationFailure,
    AuthenticationResult,
    UpdateFailure,
    UpdateResult
} from './account.js';
export { ACCOUNT_ROLES, MIN_PASSWORD_LENGTH } from './account.js';

// Store
export { CredentialStore, toAccountView } from './store.js';
