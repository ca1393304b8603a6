import { InvalidOrderException, InvalidValueException } from '../exceptions';
import { OrderId, OrderItem, OrderStatus } from '../value-objects';

/**
 * Everything an order stores, before the store assigns it an id.
 */
export interface OrderDraft {
  readonly customerName: string;
  readonly customerEmail: string;
  readonly shippingAddress: string;
  readonly items: readonly OrderItem[];
  readonly total: number;
  readonly status: OrderStatus;
}

/**
 * Entity representing a customer order.
 * Aggregate root for its OrderItems. The total is always computed server-side.
 */
export class Order {
  private constructor(
    public readonly id: OrderId,
    private readonly props: OrderDraft,
    public readonly createdAt: Date | null,
    public readonly updatedAt: Date | null,
    /** Stored fields outside the known shape, kept for the public view. */
    public readonly additionalFields: Readonly<Record<string, unknown>>,
  ) {}

  /**
   * Builds a new pending order.
   * Callers pass a total already derived from catalog prices.
   */
  static draft(input: {
    customerName: string;
    customerEmail: string;
    shippingAddress: string;
    items: readonly OrderItem[];
    total: number;
  }): OrderDraft {
    if (input.items.length === 0) {
      throw new InvalidOrderException('Order must contain at least one item');
    }
    if (!Number.isFinite(input.total) || input.total < 0) {
      throw new InvalidValueException('Order', 'total must be a non-negative number');
    }

    return {
      customerName: input.customerName,
      customerEmail: input.customerEmail,
      shippingAddress: input.shippingAddress,
      items: [...input.items],
      total: input.total,
      status: OrderStatus.pending(),
    };
  }

  // Factory method: reconstitute from persistence
  static reconstitute(props: {
    id: OrderId;
    draft: OrderDraft;
    createdAt?: Date | null;
    updatedAt?: Date | null;
    additionalFields?: Readonly<Record<string, unknown>>;
  }): Order {
    return new Order(
      props.id,
      props.draft,
      props.createdAt ?? null,
      props.updatedAt ?? null,
      { ...props.additionalFields },
    );
  }

  get customerName(): string {
    return this.props.customerName;
  }

  get customerEmail(): string {
    return this.props.customerEmail;
  }

  get shippingAddress(): string {
    return this.props.shippingAddress;
  }

  get items(): readonly OrderItem[] {
    return [...this.props.items];
  }

  get total(): number {
    return this.props.total;
  }

  get status(): OrderStatus {
    return this.props.status;
  }

  get totalQuantity(): number {
    return this.props.items.reduce((total, item) => total + item.quantity, 0);
  }

  equals(other: Order): boolean {
    return this.id.equals(other.id);
  }
}
