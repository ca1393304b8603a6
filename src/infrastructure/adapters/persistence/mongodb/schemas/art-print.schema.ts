import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for an ArtPrint.
 * Field names are stored in snake_case; `_id` is a store-assigned ObjectId.
 */
@Schema({
  collection: 'artprint',
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
  versionKey: false,
})
export class ArtPrintDocument {
  @Prop({ required: true })
  title!: string;

  @Prop({ required: true })
  artist!: string;

  @Prop({ default: '' })
  description!: string;

  @Prop({ required: true, min: 0 })
  price!: number;

  @Prop({ type: String, default: null })
  size!: string | null;

  @Prop({ type: String, default: null })
  image_url!: string | null;

  @Prop({ type: [String], default: [] })
  tags!: string[];

  @Prop({ default: true })
  in_stock!: boolean;

  @Prop({ default: false })
  featured!: boolean;

  // Managed by timestamps
  created_at?: Date;

  // Managed by timestamps
  updated_at?: Date;
}

export type ArtPrintDocumentType = HydratedDocument<ArtPrintDocument>;
export const ArtPrintSchema = SchemaFactory.createForClass(ArtPrintDocument);

// Listing by featured flag
ArtPrintSchema.index({ featured: 1 });
