/**
 * APPLICATION LAYER
 *
 * Orchestrates the flow of data between the outside world and the domain.
 *
 * Contains:
 * - Use Cases: CreateOrderUseCase, CatalogUseCase
 * - Ports: Interfaces that define how the application communicates with the outside world
 *   - Inbound: How the outside world calls us (ICreateOrderPort, ICatalogPort)
 *   - Outbound: How we reach the store (IArtPrintRepositoryPort, IOrderRepositoryPort)
 * - DTOs: Use case inputs and public outputs
 *
 * Rules:
 * - CAN import from domain layer
 * - CANNOT import from infrastructure layer
 */

export * from './common';
export * from './errors';
export * from './dtos';
export * from './ports';
export * from './use-cases';
