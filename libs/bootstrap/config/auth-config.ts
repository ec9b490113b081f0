import type { GuardRule } from '../config-guard.js';

export const MIN_SECRET_LENGTH = 32;

const isDisabled = (value: string | undefined): boolean => value === 'false' || value === '0';

/**
 * Authentication Configuration Guards
 * The signing secret has no default: a process without one must not start.
 */
export const AUTH_CONFIG_REQUIREMENTS: GuardRule[] = [
    { type: 'required', name: 'JWT_SECRET' },
    {
        type: 'assert',
        check: env => (env['JWT_SECRET'] ?? '').length >= MIN_SECRET_LENGTH,
        message: `JWT_SECRET must be at least ${MIN_SECRET_LENGTH} characters`
    },
    {
        type: 'forbidIf',
        name: 'SEED_DEMO_DATA',
        when: env => env['NODE_ENV'] === 'production' && !isDisabled(env['SEED_DEMO_DATA']),
        message: 'Demo accounts with published passwords must not be seeded in production'
    },
];
