import { InvalidValueException } from '../exceptions';

/**
 * Value Object representing the status of an order.
 *
 * New orders are always 'pending'. Stored orders may carry any status
 * string written by other tools, so reconstitution only rejects blanks.
 */
export class OrderStatus {
  static readonly PENDING = 'pending';

  private constructor(public readonly value: string) {
    this.validate();
  }

  static pending(): OrderStatus {
    return new OrderStatus(OrderStatus.PENDING);
  }

  static fromString(status: string): OrderStatus {
    return new OrderStatus(status.toLowerCase().trim());
  }

  private validate(): void {
    if (this.value.length === 0) {
      throw new InvalidValueException('OrderStatus', 'cannot be empty');
    }
  }

  isPending(): boolean {
    return this.value === OrderStatus.PENDING;
  }

  equals(other: OrderStatus): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
