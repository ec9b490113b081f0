/**
 * Integration Tests: /auth routes over the in-process express app.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import request from 'supertest';
import { createHarness, FIXED_NOW, PREFIX, type Harness } from './harness.js';

describe('Auth routes', () => {
    let h: Harness;

    beforeEach(async () => {
        h = await createHarness();
    });

    describe('POST /auth/token', () => {
        it('should issue a bearer token for form credentials', async () => {
            const res = await request(h.app)
                .post(`${PREFIX}/auth/token`)
                .type('form')
                .send({ username: 'admin', password: 'admin123' });

            assert.strictEqual(res.status, 200);
            assert.strictEqual(res.body.token_type, 'bearer');
            assert.strictEqual(typeof res.body.access_token, 'string');
            assert.strictEqual(res.body.access_token.split('.').length, 3);
        });

        it('should accept JSON credentials', async () => {
            const res = await request(h.app)
                .post(`${PREFIX}/auth/token`)
                .send({ username: 'john_doe', password: 'user123' });

            assert.strictEqual(res.status, 200);
            assert.strictEqual(res.body.token_type, 'bearer');
        });

        it('should give the same answer for unknown users and wrong passwords', async () => {
            for (const credentials of [{ username: 'admin', password: 'wrong-pass' }, { username: 'nobody', password: 'admin123' }]) {
                const res = await request(h.app).post(`${PREFIX}/auth/token`).type('form').send(credentials);

                assert.strictEqual(res.status, 401);
                assert.deepStrictEqual(res.body, { detail: 'Incorrect username or password' });
                assert.strictEqual(res.headers['www-authenticate'], 'Bearer');
            }
        });

        it('should reject a missing password as a validation error', async () => {
            const res = await request(h.app).post(`${PREFIX}/auth/token`).send({ username: 'admin' });

            assert.strictEqual(res.status, 422);
            assert.deepStrictEqual(res.body, { detail: [{ loc: 'password', msg: 'Required' }] });
        });

        it('should reject malformed JSON', async () => {
            const res = await request(h.app)
                .post(`${PREFIX}/auth/token`)
                .set('Content-Type', 'application/json')
                .send('{"username":');

            assert.strictEqual(res.status, 400);
        });
    });

    describe('POST /auth/register', () => {
        it('should create an active user account', async () => {
            const res = await request(h.app)
                .post(`${PREFIX}/auth/register`)
                .send({ username: 'alice', email: 'alice@example.com', password: 'secret1', full_name: 'Alice Liddell' });

            assert.strictEqual(res.status, 200);
            assert.deepStrictEqual(res.body, {
                id: 3,
                username: 'alice',
                email: 'alice@example.com',
                full_name: 'Alice Liddell',
                role: 'user',
                is_active: true,
                created_at: FIXED_NOW.toISOString(),
                updated_at: null
            });
        });

        it('should ignore a self-assigned role', async () => {
            const res = await request(h.app)
                .post(`${PREFIX}/auth/register`)
                .send({ username: 'mallory', email: 'mallory@example.com', password: 'secret1', role: 'admin', is_active: false });

            assert.strictEqual(res.status, 200);
            assert.strictEqual(res.body.role, 'user');
            assert.strictEqual(res.body.is_active, true);
        });

        it('should reject taken usernames and emails', async () => {
            const byName = await request(h.app)
                .post(`${PREFIX}/auth/register`)
                .send({ username: 'admin', email: 'new@example.com', password: 'secret1' });
            const byEmail = await request(h.app)
                .post(`${PREFIX}/auth/register`)
                .send({ username: 'newbie', email: 'john@example.com', password: 'secret1' });

            assert.strictEqual(byName.status, 400);
            assert.deepStrictEqual(byName.body, { detail: 'Username already registered' });
            assert.strictEqual(byEmail.status, 400);
            assert.deepStrictEqual(byEmail.body, { detail: 'Email already registered' });
        });

        it('should reject weak passwords', async () => {
            const res = await request(h.app)
                .post(`${PREFIX}/auth/register`)
                .send({ username: 'weak', email: 'weak@example.com', password: '12345' });

            assert.strictEqual(res.status, 422);
            assert.deepStrictEqual(res.body, { detail: 'Password must be at least 6 characters long' });
        });

        it('should reject an invalid email', async () => {
            const res = await request(h.app)
                .post(`${PREFIX}/auth/register`)
                .send({ username: 'bad', email: 'not-an-email', password: 'secret1' });

            assert.strictEqual(res.status, 422);
            assert.deepStrictEqual(res.body, { detail: [{ loc: 'email', msg: 'Invalid email' }] });
        });

        it('should let the new account log in', async () => {
            await request(h.app)
                .post(`${PREFIX}/auth/register`)
                .send({ username: 'alice', email: 'alice@example.com', password: 'secret1' });

            const token = await h.login('alice', 'secret1');
            const me = await request(h.app).get(`${PREFIX}/auth/me`).set('Authorization', `Bearer ${token}`);

            assert.strictEqual(me.body.username, 'alice');
        });
    });

    describe('GET /auth/me', () => {
        it('should return the caller without any password material', async () => {
            const token = await h.login('admin', 'admin123');

            const res = await request(h.app).get(`${PREFIX}/auth/me`).set('Authorization', `Bearer ${token}`);

            assert.strictEqual(res.status, 200);
            assert.deepStrictEqual(res.body, {
                id: 1,
                username: 'admin',
                email: 'admin@example.com',
                full_name: 'Administrator',
                role: 'admin',
                is_active: true,
                created_at: FIXED_NOW.toISOString(),
                updated_at: null
            });
        });

        it('should require a bearer token', async () => {
            const missing = await request(h.app).get(`${PREFIX}/auth/me`);
            const basic = await request(h.app).get(`${PREFIX}/auth/me`).set('Authorization', 'Basic dGVzdDp0ZXN0');

            for (const res of [missing, basic]) {
                assert.strictEqual(res.status, 401);
                assert.deepStrictEqual(res.body, { detail: 'Not authenticated' });
                assert.strictEqual(res.headers['www-authenticate'], 'Bearer');
            }
        });

        it('should reject forged and expired tokens alike', async () => {
            const token = await h.login('admin', 'admin123');

            const forged = await request(h.app).get(`${PREFIX}/auth/me`).set('Authorization', 'Bearer not.a.token');
            h.setNow(new Date(FIXED_NOW.getTime() + 30 * 60 * 1000));
            const expired = await request(h.app).get(`${PREFIX}/auth/me`).set('Authorization', `Bearer ${token}`);

            for (const res of [forged, expired]) {
                assert.strictEqual(res.status, 401);
                assert.deepStrictEqual(res.body, { detail: 'Could not validate credentials' });
                assert.strictEqual(res.headers['www-authenticate'], 'Bearer');
            }
        });

        it('should accept a token one second before it expires', async () => {
            const token = await h.login('admin', 'admin123');
            h.setNow(new Date(FIXED_NOW.getTime() + 30 * 60 * 1000 - 1000));

            const res = await request(h.app).get(`${PREFIX}/auth/me`).set('Authorization', `Bearer ${token}`);

            assert.strictEqual(res.status, 200);
        });

        it('should refuse an inactive account', async () => {
            const token = await h.login('john_doe', 'user123');
            await h.store.update(2, { isActive: false });

            const res = await request(h.app).get(`${PREFIX}/auth/me`).set('Authorization', `Bearer ${token}`);

            assert.strictEqual(res.status, 403);
            assert.deepStrictEqual(res.body, { detail: 'Inactive user' });
        });

        it('should refuse the token of a deleted account', async () => {
            const token = await h.login('john_doe', 'user123');
            await h.store.delete(2);

            const res = await request(h.app).get(`${PREFIX}/auth/me`).set('Authorization', `Bearer ${token}`);

            assert.strictEqual(res.status, 401);
        });
    });
});
