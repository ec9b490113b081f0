import { describe, it } from 'node:test';
import assert from 'node:assert';
import { loadSettings } from '../../libs/bootstrap/settings.js';

const SECRET = 'test-secret-test-secret-test-secret';

describe('loadSettings', () => {
    it('should apply defaults around the required secret', () => {
        assert.deepStrictEqual(loadSettings({ JWT_SECRET: SECRET }), {
            appName: 'Gatehouse Demo Server',
            appVersion: '1.0.0',
            apiPrefix: '/api/v1',
            port: 8000,
            jwtSecret: SECRET,
            jwtAlgorithm: 'HS256',
            accessTokenTtlMinutes: 30,
            passwordHashCost: 16384,
            seedDemoData: true,
            uploadDir: 'uploads',
            uploadMaxBytes: 10485760,
            allowedOrigins: ['http://localhost:3000', 'http://localhost:8080'],
            nodeEnv: 'development'
        });
    });

    it('should read overrides from the environment', () => {
        const settings = loadSettings({
            JWT_SECRET: SECRET,
            PORT: '9000',
            JWT_ALGORITHM: 'HS512',
            ACCESS_TOKEN_EXPIRE_MINUTES: '5',
            SEED_DEMO_DATA: '0',
            API_PREFIX: '/api/v2'
        });

        assert.strictEqual(settings.port, 9000);
        assert.strictEqual(settings.jwtAlgorithm, 'HS512');
        assert.strictEqual(settings.accessTokenTtlMinutes, 5);
        assert.strictEqual(settings.seedDemoData, false);
        assert.strictEqual(settings.apiPrefix, '/api/v2');
    });

    it('should split the CORS origin list', () => {
        const settings = loadSettings({ JWT_SECRET: SECRET, CORS_ORIGINS: 'https://app.example.com, http://localhost:5173,' });

        assert.deepStrictEqual(settings.allowedOrigins, ['https://app.example.com', 'http://localhost:5173']);
        assert.throws(() => loadSettings({ JWT_SECRET: SECRET, CORS_ORIGINS: 'not-an-origin' }), /CORS_ORIGINS/);
    });

    it('should treat empty variables as unset', () => {
        assert.strictEqual(loadSettings({ JWT_SECRET: SECRET, PORT: '' }).port, 8000);
    });

    it('should refuse a missing or short secret', () => {
        assert.throws(() => loadSettings({}), /Invalid configuration: JWT_SECRET/);
        assert.throws(() => loadSettings({ JWT_SECRET: 'short' }), /JWT_SECRET/);
    });

    it('should refuse an unsupported algorithm or hash cost', () => {
        assert.throws(() => loadSettings({ JWT_SECRET: SECRET, JWT_ALGORITHM: 'none' }), /JWT_ALGORITHM/);
        assert.throws(() => loadSettings({ JWT_SECRET: SECRET, PASSWORD_HASH_COST: '1000' }), /PASSWORD_HASH_COST: Must be a power of two/);
    });
});
