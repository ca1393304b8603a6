import { InvalidValueException } from '../exceptions';
import { OrderItem } from './order-item.vo';
import { PrintId } from './print-id.vo';

/**
 * A normalized order line: the requested item enriched with the title and
 * unit price the catalog held when the order was placed.
 */
export class OrderLine {
  private constructor(
    public readonly printId: PrintId,
    public readonly title: string,
    public readonly price: number,
    public readonly quantity: number,
  ) {
    this.validate();
  }

  static create(props: {
    printId: PrintId;
    title: string;
    price: number;
    quantity: number;
  }): OrderLine {
    return new OrderLine(props.printId, props.title, props.price, props.quantity);
  }

  private validate(): void {
    if (!Number.isFinite(this.price) || this.price < 0) {
      throw new InvalidValueException('OrderLine', 'price must be a non-negative number');
    }
  }

  // Unrounded price * quantity; rounding happens once on the order total
  get subtotal(): number {
    return this.price * this.quantity;
  }

  toItem(): OrderItem {
    return OrderItem.create({ printId: this.printId, quantity: this.quantity });
  }
}
