/**
 * Base exception for all domain errors.
 * Keeps the stack trace and a machine-readable code.
 */
export abstract class DomainException extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
