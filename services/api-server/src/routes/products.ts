import { Router } from 'express';
import { RequestContext } from '../../../../libs/context/requestContext.js';
import { notFound } from '../../../../libs/errors/httpErrors.js';
import { type AccessGuard, requireActive, requireRole } from '../../../../libs/guards/accessGuard.js';
import { getContextLogger } from '../../../../libs/logging/logger.js';
import { asyncHandler } from '../../../../libs/middleware/asyncHandler.js';
import { createAuthMiddleware } from '../../../../libs/middleware/authenticate.js';
import type { ProductCatalog } from '../../../../libs/products/catalog.js';
import { validate } from '../../../../libs/validation/zod-middleware.js';
import {
    CreateProductRequestSchema,
    IdParamSchema,
    ProductListQuerySchema,
    ProductSearchQuerySchema,
    UpdateProductRequestSchema
} from '../../../../libs/validation/schema.js';
import { toProductResponse } from '../presenters.js';

export interface ProductRouteDeps {
    readonly catalog: ProductCatalog;
    readonly guard: AccessGuard;
}

export function createProductRouter(deps: ProductRouteDeps): Router {
    const router = Router();
    const adminOnly = createAuthMiddleware(deps.guard, [requireActive, requireRole('admin')]);

    router.get('/', (req, res) => {
        const query = validate(ProductListQuerySchema, req.query, 'Products:List');
        const products = deps.catalog.list(
            { category: query.category, inStock: query.in_stock },
            query.skip,
            query.limit
        );
        res.json(products.map(toProductResponse));
    });

    // Registered ahead of /:id so "search" is never read as an id
    router.get('/search', (req, res) => {
        const { q } = validate(ProductSearchQuerySchema, req.query, 'Products:Search');
        res.json(deps.catalog.search(q).map(toProductResponse));
    });

    router.get('/:id', (req, res) => {
        const { id } = validate(IdParamSchema, req.params, 'Products:Get');
        const product = deps.catalog.get(id);
        if (!product) {
            throw notFound('Product not found');
        }
        res.json(toProductResponse(product));
    });

    router.post('/', adminOnly, asyncHandler(async (req, res) => {
        const input = validate(CreateProductRequestSchema, req.body, 'Products:Create');

        const product = await deps.catalog.create({
            name: input.name,
            description: input.description ?? null,
            price: input.price,
            category: input.category,
            inStock: input.in_stock,
            stockQuantity: input.stock_quantity,
        });

        getContextLogger(RequestContext.get()).info({ productId: product.id }, 'Product created by admin');
        res.json(toProductResponse(product));
    }));

    router.put('/:id', adminOnly, asyncHandler(async (req, res) => {
        const { id } = validate(IdParamSchema, req.params, 'Products:Update');
        const changes = validate(UpdateProductRequestSchema, req.body, 'Products:Update');

        const product = await deps.catalog.update(id, {
            name: changes.name,
            description: changes.description,
            price: changes.price,
            category: changes.category,
            inStock: changes.in_stock,
            stockQuantity: changes.stock_quantity,
        });
        if (!product) {
            throw notFound('Product not found');
        }

        res.json(toProductResponse(product));
    }));

    router.delete('/:id', adminOnly, asyncHandler(async (req, res) => {
        const { id } = validate(IdParamSchema, req.params, 'Products:Delete');

        if (!(await deps.catalog.delete(id))) {
            throw notFound('Product not found');
        }

        getContextLogger(RequestContext.get()).info({ productId: id }, 'Product deleted by admin');
        res.json({ message: 'Product deleted successfully' });
    }));

    return router;
}
