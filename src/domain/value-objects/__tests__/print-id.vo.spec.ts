import { PrintId } from '../print-id.vo';
import { OrderId } from '../order-id.vo';
import { InvalidValueException } from '../../exceptions';

describe('PrintId', () => {
  it('should accept a 24-character hex id and lowercase it', () => {
    const id = PrintId.fromString('  64B7F0C2A1B2C3D4E5F60718 ');

    expect(id.toString()).toBe('64b7f0c2a1b2c3d4e5f60718');
  });

  it('should reject malformed ids', () => {
    expect(() => PrintId.fromString('not-an-id')).toThrow(InvalidValueException);
    expect(() => PrintId.fromString('64b7f0c2a1b2c3d4e5f6071')).toThrow(InvalidValueException);
  });

  it('should report validity without throwing', () => {
    expect(PrintId.isValid('64b7f0c2a1b2c3d4e5f60718')).toBe(true);
    expect(PrintId.isValid('zzb7f0c2a1b2c3d4e5f60718')).toBe(false);
    expect(PrintId.isValid('')).toBe(false);
  });

  it('should compare by value', () => {
    const a = PrintId.fromString('64b7f0c2a1b2c3d4e5f60718');
    const b = PrintId.fromString('64B7F0C2A1B2C3D4E5F60718');

    expect(a.equals(b)).toBe(true);
  });
});

describe('OrderId', () => {
  it('should follow the same ObjectId format', () => {
    expect(OrderId.isValid('64b7f0c2a1b2c3d4e5f60799')).toBe(true);
    expect(OrderId.isValid('ord_123')).toBe(false);
    expect(() => OrderId.fromString('ord_123')).toThrow(InvalidValueException);
  });
});
