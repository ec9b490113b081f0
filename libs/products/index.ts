export type { Product, NewProduct, ProductChanges, ProductFilter, ProductCategory } from './product.js';
export { PRODUCT_CATEGORIES } from './product.js';
export { ProductCatalog } from './catalog.js';
