import { ExclusiveLock } from '../concurrency/exclusiveLock.js';
import { logger } from '../logging/logger.js';
import { type Clock, systemClock } from '../time/clock.js';
import type { NewProduct, Product, ProductChanges, ProductFilter } from './product.js';

function clampIndex(value: number): number {
    return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0;
}

/**
 * In-memory product catalog. Mutations share one exclusive lock with the id counter.
 */
export class ProductCatalog {
    private products: Product[] = [];
    private nextId = 1;
    private readonly lock = new ExclusiveLock();

    constructor(private readonly clock: Clock = systemClock) { }

    public async create(input: NewProduct): Promise<Product> {
        if (input.price < 0) {
            throw new RangeError('Price must be positive');
        }

        return this.lock.runExclusive((): Product => {
            const product: Product = Object.freeze({
                id: this.nextId,
                name: input.name,
                description: input.description ?? null,
                price: input.price,
                category: input.category,
                inStock: input.inStock ?? true,
                stockQuantity: input.stockQuantity ?? 0,
                createdAt: this.clock(),
                updatedAt: null
            });

            this.products.push(product);
            this.nextId += 1;

            logger.info({ productId: product.id, category: product.category }, 'Product created');
            return product;
        });
    }

    public get(id: number): Product | undefined {
        return this.products.find(p => p.id === id);
    }

    /**
     * Filters apply before pagination.
     */
    public list(filter: ProductFilter = {}, skip = 0, limit = 100): Product[] {
        const start = clampIndex(skip);
        const count = clampIndex(limit);

        return this.products
            .filter(p => filter.category === undefined || p.category === filter.category)
            .filter(p => filter.inStock === undefined || p.inStock === filter.inStock)
            .slice(start, start + count);
    }

    /**
     * Case-insensitive substring match on name or description.
     */
    public search(query: string): Product[] {
        const needle = query.toLowerCase();
        return this.products.filter(p =>
            p.name.toLowerCase().includes(needle) ||
            (p.description !== null && p.description.toLowerCase().includes(needle))
        );
    }

    public async update(id: number, changes: ProductChanges): Promise<Product | undefined> {
        if (changes.price !== undefined && changes.price < 0) {
            throw new RangeError('Price must be positive');
        }

        return this.lock.runExclusive((): Product | undefined => {
            const index = this.products.findIndex(p => p.id === id);
            if (index === -1) {
                return undefined;
            }

            const current = this.products[index];
            const now = this.clock();
            const updated: Product = Object.freeze({
                ...current,
                ...(changes.name !== undefined ? { name: changes.name } : {}),
                ...(changes.description !== undefined ? { description: changes.description } : {}),
                ...(changes.price !== undefined ? { price: changes.price } : {}),
                ...(changes.category !== undefined ? { category: changes.category } : {}),
                ...(changes.inStock !== undefined ? { inStock: changes.inStock } : {}),
                ...(changes.stockQuantity !== undefined ? { stockQuantity: changes.stockQuantity } : {}),
                updatedAt: now.getTime() < current.createdAt.getTime() ? current.createdAt : now
            });
            this.products[index] = updated;

            logger.info({ productId: id }, 'Product updated');
            return updated;
        });
    }

    public async delete(id: number): Promise<boolean> {
        return this.lock.runExclusive((): boolean => {
            const index = this.products.findIndex(p => p.id === id);
            if (index === -1) {
                return false;
            }
            this.products.splice(index, 1);
            logger.info({ productId: id }, 'Product deleted');
            return true;
        });
    }
}
