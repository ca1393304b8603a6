import { ArtPrint } from '../entities';
import { InvalidOrderException } from '../exceptions';
import { OrderItem, OrderLine } from '../value-objects';

/**
 * Domain Service pricing order items against the catalog.
 * Needs both an OrderItem and the ArtPrint it references, so it lives
 * outside either one.
 */
export class OrderPricingService {
  /**
   * Resolves an item into a normalized line carrying the print's current
   * title and price. The item must reference this print and the print
   * must be in stock.
   */
  priceItem(item: OrderItem, print: ArtPrint): OrderLine {
    if (!item.printId.equals(print.id)) {
      throw new InvalidOrderException(
        `Print ID mismatch: item has ${item.printId.toString()}, but print is ${print.id.toString()}`,
      );
    }

    if (!print.inStock) {
      throw new InvalidOrderException(`Print out of stock: ${print.title}`);
    }

    return OrderLine.create({
      printId: print.id,
      title: print.title,
      price: print.price,
      quantity: item.quantity,
    });
  }

  /**
   * Sums line subtotals in order, then rounds once to cents.
   */
  total(lines: readonly OrderLine[]): number {
    const raw = lines.reduce((sum, line) => sum + line.subtotal, 0);
    return roundHalfEven(raw, CENT_DIGITS);
  }
}

const CENT_DIGITS = 2;

// Digits past the kept ones needed to tell an exact half from a near one
const TIE_DIGITS = 25;

/**
 * Rounds the exact binary value of `value`; exact halves go to the even
 * neighbour, so 10.125 gives 10.12 and 0.375 gives 0.38.
 */
export function roundHalfEven(value: number, digits: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }

  const sign = value < 0 ? -1 : 1;
  const magnitude = Math.abs(value);
  const [whole, fraction = ''] = magnitude.toFixed(digits + TIE_DIGITS).split('.');
  const kept = fraction.slice(0, digits);
  const isExactHalf = /^50*$/.test(fraction.slice(digits));

  if (!isExactHalf) {
    return sign * Number(magnitude.toFixed(digits));
  }

  const lastKept = Number(kept.slice(-1) || whole.slice(-1));
  const truncated = Number(kept ? `${whole}.${kept}` : whole);
  const step = 10 ** -digits;

  return sign * (lastKept % 2 === 0 ? truncated : Number((truncated + step).toFixed(digits)));
}
