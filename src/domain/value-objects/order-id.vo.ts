import { InvalidValueException } from '../exceptions';

const OBJECT_ID_PATTERN = /^[a-f0-9]{24}$/i;

/**
 * Value Object representing a unique order identifier.
 * Orders get their id from the store on insert, so there is no generate().
 */
export class OrderId {
  private constructor(public readonly value: string) {
    this.validate();
  }

  // Factory method: create from existing string (request path or database)
  static fromString(id: string): OrderId {
    return new OrderId(id.trim().toLowerCase());
  }

  static isValid(id: string): boolean {
    return OBJECT_ID_PATTERN.test(id.trim());
  }

  private validate(): void {
    if (!OBJECT_ID_PATTERN.test(this.value)) {
      throw new InvalidValueException('OrderId', `"${this.value}" is not a 24-character hex id`);
    }
  }

  equals(other: OrderId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
