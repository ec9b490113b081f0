/**
 * Demo Seed
 *
 * Registers the demo accounts and sample products on an empty process.
 * Idempotent: accounts that already exist are skipped.
 */

import type { RegisterAccountInput } from '../accounts/account.js';
import type { CredentialStore } from '../accounts/store.js';
import { logger } from '../logging/logger.js';
import type { ProductCatalog } from '../products/catalog.js';
import type { NewProduct } from '../products/product.js';

export const DEMO_ACCOUNTS: readonly RegisterAccountInput[] = [
    {
        username: 'admin',
        email: 'admin@example.com',
        password: 'admin123',
        fullName: 'Administrator',
        role: 'admin',
    },
    {
        username: 'john_doe',
        email: 'john@example.com',
        password: 'user123',
        fullName: 'John Doe',
        role: 'user',
    },
];

export const SAMPLE_PRODUCTS: readonly NewProduct[] = [
    {
        name: 'MacBook Pro',
        description: 'Apple MacBook Pro 16-inch with M2 chip',
        price: 2499.99,
        category: 'electronics',
        stockQuantity: 10,
    },
    {
        name: 'Nike Air Max',
        description: 'Comfortable running shoes',
        price: 120,
        category: 'sports',
        stockQuantity: 25,
    },
    {
        name: 'Programming Fundamentals Book',
        description: 'Learn programming from scratch',
        price: 29.99,
        category: 'books',
        stockQuantity: 50,
    },
];

export interface SeedSummary {
    readonly accountsCreated: number;
    readonly productsCreated: number;
}

export async function seedDemoData(store: CredentialStore, catalog: ProductCatalog): Promise<SeedSummary> {
    let accountsCreated = 0;
    for (const input of DEMO_ACCOUNTS) {
        const result = await store.register(input);
        if (result.success) {
            accountsCreated += 1;
        } else {
            logger.debug({ username: input.username, reason: result.reason }, 'Demo account skipped');
        }
    }

    let productsCreated = 0;
    if (catalog.list({}, 0, 1).length === 0) {
        for (const product of SAMPLE_PRODUCTS) {
            await catalog.create(product);
            productsCreated += 1;
        }
    }

    logger.warn({ accountsCreated, productsCreated }, 'Demo data seeded; demo passwords are public, never enable in production');
    return { accountsCreated, productsCreated };
}
