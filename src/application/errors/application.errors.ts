/**
 * Base class for all application-level errors.
 * Each error knows the HTTP status it maps to, so controllers
 * can translate a Left without a lookup table.
 */
export abstract class ApplicationError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============ Validation Errors ============

export class ValidationError extends ApplicationError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(message: string, public readonly field?: string) {
    super(message);
  }
}

export class EmptyOrderError extends ValidationError {
  constructor() {
    super('Order must contain at least one item', 'items');
  }
}

export class PrintOutOfStockError extends ValidationError {
  constructor(title: string) {
    super(`Print out of stock: ${title}`, 'items');
  }
}

// ============ Not Found Errors ============

export class PrintNotFoundError extends ApplicationError {
  readonly code = 'PRINT_NOT_FOUND';
  readonly statusCode = 404;

  constructor(printId: string) {
    super(`Print not found: ${printId}`);
  }
}

export class OrderNotFoundError extends ApplicationError {
  readonly code = 'ORDER_NOT_FOUND';
  readonly statusCode = 404;

  constructor(orderId: string) {
    super(`Order not found: ${orderId}`);
  }
}

// ============ Store Errors ============

export class PersistenceError extends ApplicationError {
  static readonly MAX_DETAIL_LENGTH = 200;

  readonly code = 'PERSISTENCE_ERROR';
  readonly statusCode = 400;

  constructor(detail: string) {
    super(detail.slice(0, PersistenceError.MAX_DETAIL_LENGTH));
  }

  static fromUnknown(error: unknown): PersistenceError {
    return new PersistenceError(error instanceof Error ? error.message : String(error));
  }
}

export class StoreUnavailableError extends ApplicationError {
  readonly code = 'STORE_UNAVAILABLE';
  readonly statusCode = 503;

  constructor() {
    super('Store unavailable');
  }
}

// ============ Generic Errors ============

export class UnexpectedError extends ApplicationError {
  readonly code = 'UNEXPECTED_ERROR';
  readonly statusCode = 500;

  constructor(reason: string) {
    super(`An unexpected error occurred: ${reason}`);
  }
}
