import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Order, OrderDraft } from '@domain/entities';
import { OrderId } from '@domain/value-objects';
import { IOrderRepositoryPort } from '@application/ports/outbound';
import { OrderDocument } from '../schemas';
import { OrderMapper } from '../mappers';

/**
 * MongoDB implementation of IOrderRepositoryPort (`order` collection).
 */
@Injectable()
export class MongoOrderRepository implements IOrderRepositoryPort {
  constructor(
    @InjectModel(OrderDocument.name)
    private readonly orderModel: Model<OrderDocument>,
  ) {}

  /**
   * Inserts an order and returns the stored document as a domain Order.
   */
  async create(draft: OrderDraft): Promise<Order> {
    const created = await this.orderModel.create(OrderMapper.toDocument(draft));

    const stored = await this.orderModel.findById(created._id).lean().exec();
    if (!stored) {
      throw new Error(`Inserted order ${created._id.toHexString()} could not be read back`);
    }

    return OrderMapper.toDomain(stored);
  }

  async findById(id: OrderId): Promise<Order | null> {
    const document = await this.orderModel.findById(id.toString()).lean().exec();

    if (!document) {
      return null;
    }

    return OrderMapper.toDomain(document);
  }
}
