import { z } from 'zod';
import { DEFAULT_HASH_COST, isValidHashCost } from '../crypto/passwordHasher.js';
import { TOKEN_ALGORITHMS, type TokenAlgorithm } from '../crypto/tokenCodec.js';
import { DEFAULT_MAX_UPLOAD_BYTES } from '../uploads/fileValidation.js';
import type { Env } from './config-guard.js';
import { MIN_SECRET_LENGTH } from './config/auth-config.js';

const BooleanEnv = z.enum(['true', 'false', '1', '0']).transform(v => v === 'true' || v === '1');

const OriginListEnv = z.string()
    .transform(v => v.split(',').map(origin => origin.trim()).filter(origin => origin !== ''))
    .pipe(z.array(z.string().url()));

export const SettingsSchema = z.object({
    APP_NAME: z.string().default('Gatehouse Demo Server'),
    APP_VERSION: z.string().default('1.0.0'),
    API_PREFIX: z.string().regex(/^(\/[A-Za-z0-9_-]+)+$/, 'Must look like /api/v1').default('/api/v1'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    JWT_SECRET: z.string().min(MIN_SECRET_LENGTH),
    JWT_ALGORITHM: z.enum(TOKEN_ALGORITHMS).default('HS256'),
    ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
    PASSWORD_HASH_COST: z.coerce.number().int()
        .refine(isValidHashCost, 'Must be a power of two between 1024 and 131072')
        .default(DEFAULT_HASH_COST),
    SEED_DEMO_DATA: BooleanEnv.default('true'),
    UPLOAD_DIR: z.string().min(1).default('uploads'),
    UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_UPLOAD_BYTES),
    CORS_ORIGINS: OriginListEnv.default('http://localhost:3000,http://localhost:8080'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

/**
 * Process configuration, read once at startup and constant afterwards.
 */
export interface Settings {
    readonly appName: string;
    readonly appVersion: string;
    readonly apiPrefix: string;
    readonly port: number;
    readonly jwtSecret: string;
    readonly jwtAlgorithm: TokenAlgorithm;
    readonly accessTokenTtlMinutes: number;
    readonly passwordHashCost: number;
    readonly seedDemoData: boolean;
    readonly uploadDir: string;
    readonly uploadMaxBytes: number;
    /** Browser origins allowed to call the API with credentials */
    readonly allowedOrigins: readonly string[];
    readonly nodeEnv: 'development' | 'production' | 'test';
}

export function loadSettings(env: Env = process.env): Settings {
    // Empty variables count as unset so defaults apply
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );

    const result = SettingsSchema.safeParse(present);
    if (!result.success) {
        const details = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid configuration: ${details}`);
    }

    const parsed = result.data;
    return Object.freeze({
        appName: parsed.APP_NAME,
        appVersion: parsed.APP_VERSION,
        apiPrefix: parsed.API_PREFIX,
        port: parsed.PORT,
        jwtSecret: parsed.JWT_SECRET,
        jwtAlgorithm: parsed.JWT_ALGORITHM,
        accessTokenTtlMinutes: parsed.ACCESS_TOKEN_EXPIRE_MINUTES,
        passwordHashCost: parsed.PASSWORD_HASH_COST,
        seedDemoData: parsed.SEED_DEMO_DATA,
        uploadDir: parsed.UPLOAD_DIR,
        uploadMaxBytes: parsed.UPLOAD_MAX_BYTES,
        allowedOrigins: Object.freeze(parsed.CORS_ORIGINS),
        nodeEnv: parsed.NODE_ENV,
    });
}
