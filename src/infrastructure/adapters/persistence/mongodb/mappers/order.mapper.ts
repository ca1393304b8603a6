import { z } from 'zod';
import { Order, OrderDraft } from '@domain/entities';
import { OrderId, OrderItem, OrderStatus, PrintId } from '@domain/value-objects';
import { OrderDocument, OrderItemDocument } from '../schemas';
import { serializeDocument } from '../serializers';
import { storedNumber } from './stored-values';

const orderItemRecordSchema = z.object({
  print_id: z.string(),
  quantity: z.number().int().positive(),
});

/**
 * Shape of a serialized order document.
 * Unknown fields are kept; a missing or null total reads as 0.
 */
export const orderRecordSchema = z.looseObject({
  id: z.string(),
  customer_name: z.string().nullish(),
  customer_email: z.string().nullish(),
  shipping_address: z.string().nullish(),
  items: z.array(orderItemRecordSchema).nullish(),
  total: storedNumber.nullish(),
  status: z.string().nullish(),
  created_at: z.date().nullish(),
  updated_at: z.date().nullish(),
});

export type OrderRecord = z.infer<typeof orderRecordSchema>;

/**
 * Mapper for converting between Order and its MongoDB document.
 * Only print_id and quantity are stored per line; resolved titles and
 * prices are not part of the document.
 */
export class OrderMapper {
  /**
   * Converts a stored (lean) document to a domain Order.
   */
  static toDomain(document: object): Order {
    const {
      id,
      customer_name,
      customer_email,
      shipping_address,
      items,
      total,
      status,
      created_at,
      updated_at,
      ...additionalFields
    } = orderRecordSchema.parse(serializeDocument(document));

    return Order.reconstitute({
      id: OrderId.fromString(id),
      draft: {
        customerName: customer_name ?? '',
        customerEmail: customer_email ?? '',
        shippingAddress: shipping_address ?? '',
        items: (items ?? []).map((item) =>
          OrderItem.create({ printId: PrintId.fromString(item.print_id), quantity: item.quantity }),
        ),
        total: total ?? 0,
        status: OrderStatus.fromString(status ?? OrderStatus.PENDING),
      },
      createdAt: created_at,
      updatedAt: updated_at,
      additionalFields,
    });
  }

  /**
   * Converts a draft to a document ready for insert.
   */
  static toDocument(draft: OrderDraft): OrderDocument {
    const document = new OrderDocument();
    document.customer_name = draft.customerName;
    document.customer_email = draft.customerEmail;
    document.shipping_address = draft.shippingAddress;
    document.items = draft.items.map((item) => this.itemToDocument(item));
    document.total = draft.total;
    document.status = draft.status.toString();
    return document;
  }

  private static itemToDocument(item: OrderItem): OrderItemDocument {
    const document = new OrderItemDocument();
    document.print_id = item.printId.toString();
    document.quantity = item.quantity;
    return document;
  }
}
