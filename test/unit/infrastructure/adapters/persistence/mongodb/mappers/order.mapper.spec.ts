import { Types } from 'mongoose';
import { OrderMapper } from '@infrastructure/adapters/persistence/mongodb/mappers';
import { Order } from '@domain/entities';
import { OrderItem, PrintId } from '@domain/value-objects';

describe('OrderMapper', () => {
  const ORDER_HEX = '64b7f0c2a1b2c3d4e5f60799';
  const PRINT_HEX = '64b7f0c2a1b2c3d4e5f60718';

  describe('toDomain', () => {
    it('should map a stored order', () => {
      // Arrange
      const document = {
        _id: new Types.ObjectId(ORDER_HEX),
        customer_name: 'Jane Doe',
        customer_email: 'jane@example.com',
        shipping_address: '1 Main St',
        items: [{ print_id: PRINT_HEX, quantity: 2 }],
        total: 98,
        status: 'pending',
        created_at: new Date('2024-05-01T12:00:00.000Z'),
        updated_at: new Date('2024-05-01T12:00:00.000Z'),
      };

      // Act
      const order = OrderMapper.toDomain(document);

      // Assert
      expect(order.id.toString()).toBe(ORDER_HEX);
      expect(order.customerName).toBe('Jane Doe');
      expect(order.items).toHaveLength(1);
      expect(order.items[0].printId.toString()).toBe(PRINT_HEX);
      expect(order.items[0].quantity).toBe(2);
      expect(order.total).toBe(98);
      expect(order.status.isPending()).toBe(true);
    });

    it('should default a missing status to pending', () => {
      const order = OrderMapper.toDomain({
        _id: new Types.ObjectId(ORDER_HEX),
        customer_name: 'Jane Doe',
        customer_email: 'jane@example.com',
        shipping_address: '1 Main St',
        items: [{ print_id: PRINT_HEX, quantity: 1 }],
        total: 49,
      });

      expect(order.status.toString()).toBe('pending');
      expect(order.updatedAt).toBeNull();
    });

    it('should read a Decimal128 total and keep unknown fields', () => {
      // Act
      const order = OrderMapper.toDomain({
        _id: new Types.ObjectId(ORDER_HEX),
        customer_name: 'Jane Doe',
        customer_email: 'jane@example.com',
        shipping_address: '1 Main St',
        items: [{ print_id: PRINT_HEX, quantity: 1 }],
        total: Types.Decimal128.fromString('49.00'),
        gift_note: 'Happy birthday',
      });

      // Assert
      expect(order.total).toBe(49);
      expect(order.additionalFields).toEqual({ gift_note: 'Happy birthday' });
    });
  });

  describe('toDocument', () => {
    it('should store only print_id and quantity per line', () => {
      // Arrange
      const draft = Order.draft({
        customerName: 'Jane Doe',
        customerEmail: 'jane@example.com',
        shippingAddress: '1 Main St',
        items: [OrderItem.create({ printId: PrintId.fromString(PRINT_HEX), quantity: 3 })],
        total: 147,
      });

      // Act
      const document = OrderMapper.toDocument(draft);

      // Assert
      expect(document.customer_email).toBe('jane@example.com');
      expect(document.items).toHaveLength(1);
      expect(document.items[0].print_id).toBe(PRINT_HEX);
      expect(document.items[0].quantity).toBe(3);
      expect(document.total).toBe(147);
      expect(document.status).toBe('pending');
    });
  });
});
