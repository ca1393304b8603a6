import { Types } from 'mongoose';

/**
 * A stored document in its public form: `_id` replaced by a string `id`.
 */
export type PublicDocument = Record<string, unknown>;

const isObjectId = (value: unknown): value is Types.ObjectId => value instanceof Types.ObjectId;

const stringifyId = (value: unknown): string =>
  isObjectId(value) ? value.toHexString() : String(value);

/**
 * Converts a stored document into its public representation.
 *
 * `_id` is renamed to `id` and stringified. Any other top-level ObjectId
 * value is stringified in place. Everything else, nested values included,
 * passes through untouched. `null` and `undefined` are returned as-is.
 */
export function serializeDocument(document: object): PublicDocument;
export function serializeDocument(document: null): null;
export function serializeDocument(document: undefined): undefined;
export function serializeDocument(document: object | null | undefined): PublicDocument | null | undefined;
export function serializeDocument(
  document: object | null | undefined,
): PublicDocument | null | undefined {
  if (document === null || document === undefined) {
    return document;
  }

  const serialized: PublicDocument = {};

  if ('_id' in document) {
    serialized.id = stringifyId(document._id);
  }

  for (const [key, value] of Object.entries(document)) {
    if (key === '_id') {
      continue;
    }
    serialized[key] = isObjectId(value) ? value.toHexString() : value;
  }

  return serialized;
}
