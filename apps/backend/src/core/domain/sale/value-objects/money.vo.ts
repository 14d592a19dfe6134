import { InvalidAmountError } from '../errors/invalid-amount.error';

/**
 * Non-negative monetary amount held in whole cents. Values are rounded to two
 * fractional digits on creation, matching the `numeric(12,2)` columns.
 */
export class Money {
  private constructor(private readonly _cents: number) {}

  static create(amount: number, field = 'amount'): Money {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new InvalidAmountError(field, amount);
    }
    return new Money(Math.round(amount * 100));
  }

  get value(): number {
    return this._cents / 100;
  }
}
