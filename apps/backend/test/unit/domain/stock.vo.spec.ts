import { Stock } from '../../../src/core/domain/inventory/value-objects/stock.vo';
import { InvalidStockError } from '../../../src/core/domain/inventory/errors/invalid-stock.error';

describe('Stock Value Object', () => {
  it('should create with valid non-negative integer', () => {
    expect(Stock.create(100).value).toBe(100);
  });

  it('should reject negative values', () => {
    expect(() => Stock.create(-1)).toThrow(InvalidStockError);
  });

  it('should reject non-integer values', () => {
    expect(() => Stock.create(1.5)).toThrow(InvalidStockError);
  });

  it('should reject NaN', () => {
    expect(() => Stock.create(NaN)).toThrow(InvalidStockError);
  });

  it('should allow zero', () => {
    expect(Stock.create(0).value).toBe(0);
  });

  it('should report whether it covers a quantity', () => {
    const stock = Stock.create(5);
    expect(stock.covers(5)).toBe(true);
    expect(stock.covers(6)).toBe(false);
  });

  it('should subtract without mutating the original', () => {
    const stock = Stock.create(5);
    const remaining = stock.subtract(3);
    expect(remaining.value).toBe(2);
    expect(stock.value).toBe(5);
  });

  it('should refuse to subtract below zero', () => {
    expect(() => Stock.create(2).subtract(3)).toThrow(InvalidStockError);
  });
});
