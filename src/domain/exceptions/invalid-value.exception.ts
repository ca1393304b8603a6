import { DomainException } from './domain.exception';

/**
 * Thrown when a value object or entity draft receives an invalid value.
 * Examples: malformed PrintId, negative price, zero quantity.
 */
export class InvalidValueException extends DomainException {
  constructor(valueObjectName: string, reason: string) {
    super(`Invalid ${valueObjectName}: ${reason}`, 'INVALID_VALUE');
  }
}
