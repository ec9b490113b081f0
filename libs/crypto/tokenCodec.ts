/**
 * Token Codec
 *
 * Issues and verifies signed, self-contained identity tokens (HMAC JWT via jose).
 * There is no server-side session state and therefore no revocation: a token
 * stays valid until it expires or its subject disappears from the store.
 *
 * Registered JWT timestamps are whole seconds, so the exact expiry instant is
 * also carried in milliseconds (`exp_ms`) and is the one that decides expiry.
 * `exp` is rounded up so jose never rejects a token before `exp_ms` passes.
 */

import { SignJWT, jwtVerify, errors } from 'jose';
import { logger } from '../logging/logger.js';

export const TOKEN_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type TokenAlgorithm = typeof TOKEN_ALGORITHMS[number];

export type TokenVerificationFailure = 'MALFORMED' | 'EXPIRED';

export type TokenVerificationResult =
    | { success: true; subject: string }
    | { success: false; reason: TokenVerificationFailure };

export interface TokenCodecOptions {
    /** Process-wide signing secret, fixed for the process lifetime */
    readonly secret: string;
    readonly algorithm: TokenAlgorithm;
}

/** Private claim holding the expiry instant in epoch milliseconds */
export const EXPIRES_AT_MS_CLAIM = 'exp_ms';

export class TokenCodec {
    private readonly key: Uint8Array;
    private readonly algorithm: TokenAlgorithm;

    constructor(options: TokenCodecOptions) {
        if (!options.secret) {
            throw new Error('Token signing secret must not be empty');
        }
        this.key = new TextEncoder().encode(options.secret);
        this.algorithm = options.algorithm;
    }

    /**
     * Seal `subject` into a token valid for [now, now + ttlSeconds).
     */
    public async issue(subject: string, now: Date, ttlSeconds: number): Promise<string> {
        const expiresAtMs = now.getTime() + Math.floor(ttlSeconds * 1000);

        return new SignJWT({ [EXPIRES_AT_MS_CLAIM]: expiresAtMs })
            .setProtectedHeader({ alg: this.algorithm, typ: 'JWT' })
            .setSubject(subject)
            .setIssuedAt(Math.floor(now.getTime() / 1000))
            .setExpirationTime(Math.ceil(expiresAtMs / 1000))
            .sign(this.key);
    }

    /**
     * Returns the token subject only; resolving the account is the guard's job.
     */
    public async verify(token: string, now: Date): Promise<TokenVerificationResult> {
        try {
            const { payload } = await jwtVerify(token, this.key, {
                algorithms: [this.algorithm], // SECURITY: Prevent alg confusion
                currentDate: now,
                requiredClaims: ['sub', 'iat', 'exp', EXPIRES_AT_MS_CLAIM]
            });

            const expiresAtMs = payload[EXPIRES_AT_MS_CLAIM];
            if (typeof payload.sub !== 'string' || payload.sub.length === 0 || typeof expiresAtMs !== 'number') {
                return { success: false, reason: 'MALFORMED' };
            }
            if (now.getTime() >= expiresAtMs) {
                return { success: false, reason: 'EXPIRED' };
            }
            return { success: true, subject: payload.sub };
        } catch (error: unknown) {
            if (error instanceof errors.JWTExpired) {
                return { success: false, reason: 'EXPIRED' };
            }

            const errorMessage = error instanceof Error ? error.message : String(error);
            logger.debug({ error: errorMessage }, 'Token rejected as malformed');
            return { success: false, reason: 'MALFORMED' };
        }
    }
}
