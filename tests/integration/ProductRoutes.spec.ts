/**
 * Integration Tests: /products routes over the in-process express app.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import request from 'supertest';
import { createHarness, FIXED_NOW, PREFIX, type Harness } from './harness.js';

describe('Product routes', () => {
    let h: Harness;
    let adminToken: string;
    let userToken: string;

    beforeEach(async () => {
        h = await createHarness();
        adminToken = await h.login('admin', 'admin123');
        userToken = await h.login('john_doe', 'user123');
    });

    const auth = (token: string) => ({ Authorization: `Bearer ${token}` });
    const names = (body: Array<{ name: string }>) => body.map(p => p.name);

    it('should list the catalog publicly', async () => {
        const res = await request(h.app).get(`${PREFIX}/products/`);

        assert.strictEqual(res.status, 200);
        assert.deepStrictEqual(names(res.body), ['MacBook Pro', 'Nike Air Max', 'Programming Fundamentals Book']);
        assert.deepStrictEqual(res.body[0], {
            id: 1,
            name: 'MacBook Pro',
            description: 'Apple MacBook Pro 16-inch with M2 chip',
            price: 2499.99,
            category: 'electronics',
            in_stock: true,
            stock_quantity: 10,
            created_at: FIXED_NOW.toISOString(),
            updated_at: null
        });
    });

    it('should filter by category and paginate', async () => {
        const books = await request(h.app).get(`${PREFIX}/products/?category=books`);
        const page = await request(h.app).get(`${PREFIX}/products/?skip=1&limit=1`);
        const bad = await request(h.app).get(`${PREFIX}/products/?category=toys`);

        assert.deepStrictEqual(names(books.body), ['Programming Fundamentals Book']);
        assert.deepStrictEqual(names(page.body), ['Nike Air Max']);
        assert.strictEqual(bad.status, 422);
    });

    it('should search names and descriptions', async () => {
        const res = await request(h.app).get(`${PREFIX}/products/search?q=SCRATCH`);
        const empty = await request(h.app).get(`${PREFIX}/products/search`);

        assert.deepStrictEqual(names(res.body), ['Programming Fundamentals Book']);
        assert.strictEqual(empty.status, 422);
    });

    it('should get one product or 404', async () => {
        const found = await request(h.app).get(`${PREFIX}/products/2`);
        const missing = await request(h.app).get(`${PREFIX}/products/99`);

        assert.strictEqual(found.body.name, 'Nike Air Max');
        assert.strictEqual(missing.status, 404);
        assert.deepStrictEqual(missing.body, { detail: 'Product not found' });
    });

    it('should let an admin create a product with defaults', async () => {
        const res = await request(h.app)
            .post(`${PREFIX}/products/`)
            .set(auth(adminToken))
            .send({ name: 'Bookshelf', price: 80, category: 'home' });

        assert.strictEqual(res.status, 200);
        assert.strictEqual(res.body.id, 4);
        assert.strictEqual(res.body.in_stock, true);
        assert.strictEqual(res.body.stock_quantity, 0);
        assert.strictEqual(res.body.description, null);
    });

    it('should forbid non-admins from creating products', async () => {
        const res = await request(h.app)
            .post(`${PREFIX}/products/`)
            .set(auth(userToken))
            .send({ name: 'Bookshelf', price: 80, category: 'home' });

        assert.strictEqual(res.status, 403);
        assert.deepStrictEqual(res.body, { detail: 'Not enough permissions' });
    });

    it('should require a token to create products', async () => {
        const res = await request(h.app).post(`${PREFIX}/products/`).send({ name: 'Bookshelf', price: 80, category: 'home' });

        assert.strictEqual(res.status, 401);
    });

    it('should reject a negative price', async () => {
        const res = await request(h.app)
            .post(`${PREFIX}/products/`)
            .set(auth(adminToken))
            .send({ name: 'Refund', price: -5, category: 'home' });

        assert.strictEqual(res.status, 422);
        assert.deepStrictEqual(res.body, { detail: [{ loc: 'price', msg: 'Price must be positive' }] });
    });

    it('should let an admin update and delete products', async () => {
        const updated = await request(h.app)
            .put(`${PREFIX}/products/2`)
            .set(auth(adminToken))
            .send({ price: 99.99, in_stock: false });

        assert.strictEqual(updated.status, 200);
        assert.strictEqual(updated.body.price, 99.99);
        assert.strictEqual(updated.body.in_stock, false);
        assert.strictEqual(updated.body.updated_at, FIXED_NOW.toISOString());

        const deleted = await request(h.app).delete(`${PREFIX}/products/2`).set(auth(adminToken));
        assert.deepStrictEqual(deleted.body, { message: 'Product deleted successfully' });

        const gone = await request(h.app).delete(`${PREFIX}/products/2`).set(auth(adminToken));
        assert.strictEqual(gone.status, 404);
    });

    it('should filter by stock after an update', async () => {
        await request(h.app).put(`${PREFIX}/products/1`).set(auth(adminToken)).send({ in_stock: false });

        const res = await request(h.app).get(`${PREFIX}/products/?in_stock=false`);

        assert.deepStrictEqual(names(res.body), ['MacBook Pro']);
    });
});
