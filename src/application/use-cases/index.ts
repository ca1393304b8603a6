export { CreateOrderUseCase } from './create-order.use-case';
export { CatalogUseCase } from './catalog.use-case';
