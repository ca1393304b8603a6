import { Order, OrderDraft } from '@domain/entities';
import { OrderId } from '@domain/value-objects';

export interface IOrderRepositoryPort {
  /**
   * Inserts a new order and reads it back as stored.
   *
   * @param draft - A validated, priced order
   * @returns The persisted order with its assigned id and timestamps
   * @throws Error if the store rejects the insert
   */
  create(draft: OrderDraft): Promise<Order>;

  /**
   * Retrieves an order by its unique identifier.
   *
   * @returns Promise resolving to the order if found, null otherwise
   */
  findById(id: OrderId): Promise<Order | null>;
}
