import { InvalidQuantityError } from '../errors/invalid-quantity.error';

export class Quantity {
  private constructor(private readonly _value: number) {}

  static create(value: number): Quantity {
    if (!Number.isInteger(value) || value <= 0) {
      throw new InvalidQuantityError(value);
    }
    return new Quantity(value);
  }

  get value(): number {
    return this._value;
  }
}
