export {
  InMemoryProductCatalog,
  type Product,
  type NewProduct,
  type ProductCatalog,
} from './product-catalog.js';
