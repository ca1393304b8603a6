import { Types } from 'mongoose';
import { z } from 'zod';

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Lean reads may hand back a Decimal128 from a different bson copy than mongoose's
const isDecimal128 = (value: unknown): value is Types.Decimal128 =>
  value instanceof Types.Decimal128 ||
  (typeof value === 'object' &&
    value !== null &&
    '_bsontype' in value &&
    value._bsontype === 'Decimal128');

/**
 * A number as any writer may have stored it: a double, numeric text or a
 * Decimal128. Always parsed to a JS number.
 */
export const storedNumber = z.union([
  z.number(),
  z.string().trim().regex(NUMERIC_TEXT).transform(Number),
  z.custom<Types.Decimal128>(isDecimal128).transform((value) => Number(value.toString())),
]);
