import { z } from 'zod';
import { ArtPrint, ArtPrintDraft } from '@domain/entities';
import { PrintId } from '@domain/value-objects';
import { ArtPrintDocument } from '../schemas';
import { serializeDocument } from '../serializers';
import { storedNumber } from './stored-values';

/**
 * Shape of a serialized artprint document.
 * Documents written by other tools may lack fields, hold `null` or carry
 * fields of their own; missing and null values fall back to catalog
 * defaults and unknown fields are kept.
 */
export const artPrintRecordSchema = z.looseObject({
  id: z.string(),
  title: z.string().nullish(),
  artist: z.string().nullish(),
  description: z.string().nullish(),
  price: storedNumber.nullish(),
  size: z.string().nullish(),
  image_url: z.string().nullish(),
  tags: z.array(z.string()).nullish(),
  in_stock: z.boolean().nullish(),
  featured: z.boolean().nullish(),
  created_at: z.date().nullish(),
  updated_at: z.date().nullish(),
});

export type ArtPrintRecord = z.infer<typeof artPrintRecordSchema>;

/**
 * Mapper for converting between ArtPrint and its MongoDB document.
 */
export class ArtPrintMapper {
  /**
   * Converts a stored (lean) document to a domain ArtPrint.
   * The document is serialized first, so the id arrives as a hex string.
   */
  static toDomain(document: object): ArtPrint {
    const {
      id,
      title,
      artist,
      description,
      price,
      size,
      image_url,
      tags,
      in_stock,
      featured,
      created_at,
      updated_at,
      ...additionalFields
    } = artPrintRecordSchema.parse(serializeDocument(document));

    return ArtPrint.reconstitute({
      id: PrintId.fromString(id),
      draft: {
        title: title ?? '',
        artist: artist ?? '',
        description: description ?? '',
        price: price ?? 0,
        size: size ?? null,
        imageUrl: image_url ?? null,
        tags: tags ?? [],
        inStock: in_stock ?? true,
        featured: featured ?? false,
      },
      createdAt: created_at,
      updatedAt: updated_at,
      additionalFields,
    });
  }

  /**
   * Converts a draft to a document ready for insert.
   * `_id` and timestamps are left to the store.
   */
  static toDocument(draft: ArtPrintDraft): ArtPrintDocument {
    const document = new ArtPrintDocument();
    document.title = draft.title;
    document.artist = draft.artist;
    document.description = draft.description;
    document.price = draft.price;
    document.size = draft.size;
    document.image_url = draft.imageUrl;
    document.tags = [...draft.tags];
    document.in_stock = draft.inStock;
    document.featured = draft.featured;
    return document;
  }
}
