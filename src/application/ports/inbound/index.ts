// Order placement (catalog-priced)
export { ICreateOrderPort } from './create-order.port';

// Catalog browsing and creation
export { ICatalogPort } from './catalog.port';
