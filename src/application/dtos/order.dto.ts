/**
 * DTOs for order use cases.
 *
 * Input DTOs use camelCase like the rest of the application layer.
 * Output DTOs are the public representation returned to clients,
 * so they keep the stored snake_case field names.
 */

/**
 * One requested line: a catalog reference and a quantity.
 * printId is kept as the raw string the client sent, so a malformed id
 * can be reported back verbatim.
 */
export interface OrderItemInputDto {
  readonly printId: string;
  readonly quantity: number;
}

/**
 * Input for placing a new order.
 * No prices or titles: those are always read from the catalog.
 */
export interface CreateOrderInputDto {
  readonly customerName: string;
  readonly customerEmail: string;
  readonly shippingAddress: string;
  readonly items: readonly OrderItemInputDto[];
}

// ============ Output DTOs ============

/**
 * A stored order line, as persisted.
 */
export interface OrderItemOutputDto {
  readonly print_id: string;
  readonly quantity: number;
}

/**
 * A normalized line resolved against the catalog at creation time.
 */
export interface OrderLineOutputDto {
  readonly print_id: string;
  readonly title: string;
  readonly price: number;
  readonly quantity: number;
}

/**
 * Public representation of a stored order.
 * Stored fields outside this shape are passed through as they are.
 */
export interface OrderOutputDto {
  readonly [field: string]: unknown;
  readonly id: string;
  readonly customer_name: string;
  readonly customer_email: string;
  readonly shipping_address: string;
  readonly items: OrderItemOutputDto[];
  readonly total: number;
  readonly status: string;
  readonly created_at: string | null;
  readonly updated_at: string | null;
}

/**
 * Output of order creation: the stored order plus the resolved lines.
 * items_detailed is only returned, never stored.
 */
export interface CreatedOrderOutputDto extends OrderOutputDto {
  readonly items_detailed: OrderLineOutputDto[];
}
