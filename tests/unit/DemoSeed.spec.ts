import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CredentialStore } from '../../libs/accounts/store.js';
import { seedDemoData } from '../../libs/bootstrap/seed.js';
import { MIN_HASH_COST, ScryptPasswordHasher } from '../../libs/crypto/passwordHasher.js';
import { ProductCatalog } from '../../libs/products/catalog.js';

describe('seedDemoData', () => {
    it('should register the demo accounts and sample products', async () => {
        const store = new CredentialStore(new ScryptPasswordHasher(MIN_HASH_COST));
        const catalog = new ProductCatalog();

        assert.deepStrictEqual(await seedDemoData(store, catalog), { accountsCreated: 2, productsCreated: 3 });

        assert.deepStrictEqual(store.list(0, 10).map(a => [a.username, a.role]), [['admin', 'admin'], ['john_doe', 'user']]);
        assert.strictEqual((await store.authenticate('admin', 'admin123')).success, true);
        assert.strictEqual((await store.authenticate('john_doe', 'user123')).success, true);
        assert.deepStrictEqual(catalog.list().map(p => p.name), ['MacBook Pro', 'Nike Air Max', 'Programming Fundamentals Book']);
    });

    it('should be idempotent', async () => {
        const store = new CredentialStore(new ScryptPasswordHasher(MIN_HASH_COST));
        const catalog = new ProductCatalog();

        await seedDemoData(store, catalog);
        assert.deepStrictEqual(await seedDemoData(store, catalog), { accountsCreated: 0, productsCreated: 0 });
        assert.strictEqual(store.size, 2);
        assert.strictEqual(catalog.list().length, 3);
    });
});
