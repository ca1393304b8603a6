import { DomainException } from './domain.exception';

/**
 * Thrown when an order breaks a business rule,
 * e.g. it has no items or a line references the wrong print.
 */
export class InvalidOrderException extends DomainException {
  constructor(message: string) {
    super(message, 'INVALID_ORDER');
  }
}
