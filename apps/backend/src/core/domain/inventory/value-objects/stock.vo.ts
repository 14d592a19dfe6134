import { InvalidStockError } from '../errors/invalid-stock.error';

export class Stock {
  private constructor(private readonly _value: number) {}

  static create(quantity: number): Stock {
    if (!Number.isInteger(quantity) || quantity < 0) {
      throw new InvalidStockError(quantity);
    }
    return new Stock(quantity);
  }

  get value(): number {
    return this._value;
  }

  covers(quantity: number): boolean {
    return this._value >= quantity;
  }

  subtract(quantity: number): Stock {
    return Stock.create(this._value - quantity);
  }
}
