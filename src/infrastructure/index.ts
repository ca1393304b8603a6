/**
 * INFRASTRUCTURE LAYER
 *
 * Contains all external implementations and framework-specific code.
 * This layer adapts external tools to work with our application.
 *
 * Contains:
 * - Adapters: MongoDB repositories, schemas, mappers and the document serializer
 * - HTTP: NestJS controllers, request DTOs, the store guard
 * - Database: catalog seeding (startup and CLI)
 * - Config, logging and metrics
 *
 * Rules:
 * - CAN import from domain and application layers
 * - Implements interfaces defined in application/ports
 * - Contains all framework-specific code (NestJS, Mongoose, etc.)
 */

export * from './adapters';
export * from './config';
export * from './http';
