import { InvalidValueException } from '../exceptions';
import { PrintId } from './print-id.vo';

/**
 * Value Object for one requested line of an order: which print, how many.
 * This is all an order stores per line; titles and prices are resolved
 * from the catalog when the order is placed.
 */
export class OrderItem {
  private constructor(public readonly printId: PrintId, public readonly quantity: number) {
    this.validate();
  }

  static create(props: { printId: PrintId; quantity: number }): OrderItem {
    return new OrderItem(props.printId, props.quantity);
  }

  private validate(): void {
    if (!Number.isInteger(this.quantity)) {
      throw new InvalidValueException('OrderItem', 'quantity must be a whole number');
    }
    if (this.quantity < 1) {
      throw new InvalidValueException('OrderItem', 'quantity must be at least 1');
    }
  }

  equals(other: OrderItem): boolean {
    return this.printId.equals(other.printId) && this.quantity === other.quantity;
  }
}
