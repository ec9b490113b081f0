import { z } from 'zod';
import { ACCOUNT_ROLES } from '../accounts/account.js';
import { PRODUCT_CATEGORIES } from '../products/product.js';

/**
 * Input Validation Framework
 * Central schema definitions for all request inputs. Wire names are snake_case.
 */

// --- Shared ---

export const IdParamSchema = z.object({
    id: z.coerce.number().int().positive(),
});

export const PaginationQuerySchema = z.object({
    skip: z.coerce.number().int().min(0).default(0),
    limit: z.coerce.number().int().min(1).max(100).default(100),
});

const BooleanQuery = z.enum(['true', 'false']).transform(v => v === 'true');

// --- Authentication Schemas ---

export const LoginRequestSchema = z.object({
    username: z.string().min(1),
    password: z.string().min(1),
});

// Password policy is enforced by the credential store, not here
export const RegisterRequestSchema = z.object({
    username: z.string().min(1).max(64),
    email: z.string().email().max(254),
    password: z.string(),
    full_name: z.string().max(128).nullable().optional(),
});

// --- Account Schemas ---

export const CreateAccountRequestSchema = RegisterRequestSchema.extend({
    role: z.enum(ACCOUNT_ROLES).default('user'),
    is_active: z.boolean().default(true),
});

export const UpdateAccountRequestSchema = z.object({
    email: z.string().email().max(254).optional(),
    full_name: z.string().max(128).nullable().optional(),
    role: z.enum(ACCOUNT_ROLES).optional(),
    is_active: z.boolean().optional(),
}).strict();

// --- Product Schemas ---

export const CreateProductRequestSchema = z.object({
    name: z.string().min(1).max(200),
    description: z.string().max(2000).nullable().optional(),
    price: z.number().min(0, 'Price must be positive'),
    category: z.enum(PRODUCT_CATEGORIES),
    in_stock: z.boolean().default(true),
    stock_quantity: z.number().int().min(0).default(0),
});

export const UpdateProductRequestSchema = z.object({
    name: z.string().min(1).max(200).optional(),
    description: z.string().max(2000).nullable().optional(),
    price: z.number().min(0, 'Price must be positive').optional(),
    category: z.enum(PRODUCT_CATEGORIES).optional(),
    in_stock: z.boolean().optional(),
    stock_quantity: z.number().int().min(0).optional(),
}).strict();

export const ProductListQuerySchema = PaginationQuerySchema.extend({
    category: z.enum(PRODUCT_CATEGORIES).optional(),
    in_stock: BooleanQuery.optional(),
});

export const ProductSearchQuerySchema = z.object({
    q: z.string().min(1),
});

// --- Miscellaneous Schemas ---

export const EchoQuerySchema = z.object({
    message: z.string(),
});

export const EchoBodySchema = z.record(z.unknown());

export const WeatherQuerySchema = z.object({
    city: z.string().min(1),
});

export const SlowQuerySchema = z.object({
    delay: z.coerce.number().int().min(1).max(30).default(5),
});

export const ErrorQuerySchema = z.object({
    status_code: z.coerce.number().int().min(400).max(599).default(500),
});

export type RegisterRequest = z.output<typeof RegisterRequestSchema>;
export type CreateAccountRequest = z.output<typeof CreateAccountRequestSchema>;
export type UpdateAccountRequest = z.output<typeof UpdateAccountRequestSchema>;
export type CreateProductRequest = z.output<typeof CreateProductRequestSchema>;
export type UpdateProductRequest = z.output<typeof UpdateProductRequestSchema>;
