/**
 * Centralized Redaction Configuration
 * Defines keys that must be redacted from logs to prevent credential leakage.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'password', '*.password',
    'passwordHash', '*.passwordHash',
    'hashed_password', '*.hashed_password',
    'secret', '*.secret',
    'jwtSecret', '*.jwtSecret',

    // Request headers as serialized by the request logger
    'headers.authorization',
    'headers.cookie'
];

export const REDACT_CENSOR = '[REDACTED]';
