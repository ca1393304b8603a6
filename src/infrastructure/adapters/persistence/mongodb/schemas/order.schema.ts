import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose subdocument for order items.
 * print_id references an artprint document; it is stored as a plain string.
 */
@Schema({ _id: false })
export class OrderItemDocument {
  @Prop({ required: true })
  print_id!: string;

  @Prop({ required: true, min: 1 })
  quantity!: number;
}

export const OrderItemSchema = SchemaFactory.createForClass(OrderItemDocument);

/**
 * Mongoose document for an Order.
 */
@Schema({
  collection: 'order',
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
  versionKey: false,
})
export class OrderDocument {
  @Prop({ required: true })
  customer_name!: string;

  @Prop({ required: true })
  customer_email!: string;

  @Prop({ required: true })
  shipping_address!: string;

  @Prop({ type: [OrderItemSchema], default: [] })
  items!: OrderItemDocument[];

  @Prop({ required: true, min: 0 })
  total!: number;

  @Prop({ required: true, default: 'pending' })
  status!: string;

  // Managed by timestamps
  created_at?: Date;

  // Managed by timestamps
  updated_at?: Date;
}

export type OrderDocumentType = HydratedDocument<OrderDocument>;
export const OrderSchema = SchemaFactory.createForClass(OrderDocument);

OrderSchema.index({ status: 1 });
OrderSchema.index({ customer_email: 1 });
