import type { Account } from '../../../libs/accounts/account.js';
import type { Product } from '../../../libs/products/product.js';

/**
 * Wire views. Domain objects are camelCase; the HTTP surface is snake_case.
 */

export interface AccountResponse {
    id: number;
    username: string;
    email: string;
    full_name: string | null;
    role: Account['role'];
    is_active: boolean;
    created_at: string;
    updated_at: string | null;
}

export interface ProductResponse {
    id: number;
    name: string;
    description: string | null;
    price: number;
    category: Product['category'];
    in_stock: boolean;
    stock_quantity: number;
    created_at: string;
    updated_at: string | null;
}

export interface TokenResponse {
    access_token: string;
    token_type: 'bearer';
}

export function toAccountResponse(account: Account): AccountResponse {
    return {
        id: account.id,
        username: account.username,
        email: account.email,
        full_name: account.fullName,
        role: account.role,
        is_active: account.isActive,
        created_at: account.createdAt.toISOString(),
        updated_at: account.updatedAt ? account.updatedAt.toISOString() : null,
    };
}

export function toProductResponse(product: Product): ProductResponse {
    return {
        id: product.id,
        name: product.name,
        description: product.description,
        price: product.price,
        category: product.category,
        in_stock: product.inStock,
        stock_quantity: product.stockQuantity,
        created_at: product.createdAt.toISOString(),
        updated_at: product.updatedAt ? product.updatedAt.toISOString() : null,
    };
}
