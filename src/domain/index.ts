/**
 * DOMAIN LAYER
 *
 * Catalog and order rules with no framework or database dependencies.
 *
 * Contains:
 * - Entities: ArtPrint, Order
 * - Value Objects: PrintId, OrderId, OrderStatus, OrderItem, OrderLine
 * - Exceptions: DomainException and its subclasses
 * - Services: OrderPricingService
 *
 * Rules:
 * - NO imports from application or infrastructure layers
 * - NO imports from external libraries
 */

export * from './entities';
export * from './value-objects';
export * from './exceptions';
export * from './services';
