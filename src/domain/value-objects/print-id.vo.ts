import { InvalidValueException } from '../exceptions';

const OBJECT_ID_PATTERN = /^[a-f0-9]{24}$/i;

/**
 * Value Object identifying an art print in the catalog.
 * Wraps the store-assigned ObjectId in its 24-character hex form.
 */
export class PrintId {
  private constructor(public readonly value: string) {
    this.validate();
  }

  static fromString(id: string): PrintId {
    return new PrintId(id.trim().toLowerCase());
  }

  static isValid(id: string): boolean {
    return OBJECT_ID_PATTERN.test(id.trim());
  }

  private validate(): void {
    if (!OBJECT_ID_PATTERN.test(this.value)) {
      throw new InvalidValueException('PrintId', `"${this.value}" is not a 24-character hex id`);
    }
  }

  equals(other: PrintId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
