import { InvalidSaleNumberError } from '../errors/invalid-sale-number.error';

const SALE_NUMBER_PATTERN = /^SALE\d{4}\d{4}$/;

export const SALE_NUMBER_PREFIX = 'SALE';
export const SALE_NUMBER_MIN_SUFFIX = 1000;
export const SALE_NUMBER_MAX_SUFFIX = 9999;

export class SaleNumber {
  private constructor(private readonly _value: string) {}

  static compose(year: number, suffix: number): SaleNumber {
    return SaleNumber.from(`${SALE_NUMBER_PREFIX}${year}${suffix}`);
  }

  static from(value: string): SaleNumber {
    if (!SALE_NUMBER_PATTERN.test(value)) {
      throw new InvalidSaleNumberError(value);
    }
    return new SaleNumber(value);
  }

  get value(): string {
    return this._value;
  }
}
