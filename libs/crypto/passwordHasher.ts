/**
 * Credential Hasher
 *
 * Salted scrypt digests, verified in constant time.
 * Digest format: `scrypt$<cost>$<saltHex>$<keyHex>`. The cost travels with the
 * digest so a store holding digests of different costs still verifies all of them.
 */

import crypto from 'crypto';

const SCHEME = 'scrypt';
const SALT_BYTES = 16;
const KEY_BYTES = 64;
const BLOCK_SIZE = 8;
const PARALLELIZATION = 1;

export const DEFAULT_HASH_COST = 16_384;
export const MIN_HASH_COST = 1 << 10;
export const MAX_HASH_COST = 1 << 17;

export interface PasswordHasher {
    hash(plaintext: string): Promise<string>;
    verify(plaintext: string, digest: string): Promise<boolean>;
}

interface ParsedDigest {
    cost: number;
    salt: Buffer;
    key: Buffer;
}

export function isValidHashCost(cost: number): boolean {
    return Number.isInteger(cost)
        && cost >= MIN_HASH_COST
        && cost <= MAX_HASH_COST
        && (cost & (cost - 1)) === 0;
}

function deriveKey(plaintext: string, salt: Buffer, cost: number, keyLength: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        crypto.scrypt(
            plaintext,
            salt,
            keyLength,
            { N: cost, r: BLOCK_SIZE, p: PARALLELIZATION, maxmem: 256 * cost * BLOCK_SIZE },
            (err, derived) => (err ? reject(err) : resolve(derived))
        );
    });
}

const HEX = /^(?:[0-9a-f]{2})+$/;

function parseDigest(digest: string): ParsedDigest | null {
    const parts = digest.split('$');
    if (parts.length !== 4) return null;

    const [scheme, costText, saltHex, keyHex] = parts;
    if (scheme !== SCHEME || !/^\d+$/.test(costText)) return null;

    const cost = Number(costText);
    if (!isValidHashCost(cost)) return null;
    if (!HEX.test(saltHex) || !HEX.test(keyHex)) return null;

    return { cost, salt: Buffer.from(saltHex, 'hex'), key: Buffer.from(keyHex, 'hex') };
}

export class ScryptPasswordHasher implements PasswordHasher {
    constructor(private readonly cost: number = DEFAULT_HASH_COST) {
        if (!isValidHashCost(cost)) {
            throw new Error(`Hash cost must be a power of two between ${MIN_HASH_COST} and ${MAX_HASH_COST}, got ${cost}`);
        }
    }

    public async hash(plaintext: string): Promise<string> {
        const salt = crypto.randomBytes(SALT_BYTES);
        const key = await deriveKey(plaintext, salt, this.cost, KEY_BYTES);
        return [SCHEME, String(this.cost), salt.toString('hex'), key.toString('hex')].join('$');
    }

    /**
     * Malformed digests verify as false rather than throwing.
     */
    public async verify(plaintext: string, digest: string): Promise<boolean> {
        const parsed = parseDigest(digest);
        if (!parsed) return false;

        const candidate = await deriveKey(plaintext, parsed.salt, parsed.cost, parsed.key.length);

        // Timing-safe comparison over equal-length buffers
        return candidate.length === parsed.key.length && crypto.timingSafeEqual(candidate, parsed.key);
    }
}
