/**
 * Product Catalog Model
 */

export const PRODUCT_CATEGORIES = ['electronics', 'clothing', 'books', 'home', 'sports'] as const;

export type ProductCategory = typeof PRODUCT_CATEGORIES[number];

export interface Product {
    readonly id: number;
    readonly name: string;
    readonly description: string | null;
    /** Non-negative */
    readonly price: number;
    readonly category: ProductCategory;
    readonly inStock: boolean;
    readonly stockQuantity: number;
    readonly createdAt: Date;
    readonly updatedAt: Date | null;
}

export interface NewProduct {
    readonly name: string;
    readonly description?: string | null;
    readonly price: number;
    readonly category: ProductCategory;
    readonly inStock?: boolean;
    readonly stockQuantity?: number;
}

export interface ProductChanges {
    readonly name?: string;
    readonly description?: string | null;
    readonly price?: number;
    readonly category?: ProductCategory;
    readonly inStock?: boolean;
    readonly stockQuantity?: number;
}

export interface ProductFilter {
    readonly category?: ProductCategory;
    readonly inStock?: boolean;
}
