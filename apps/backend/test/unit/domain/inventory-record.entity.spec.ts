import { InventoryRecord } from '../../../src/core/domain/inventory/entities/inventory-record.entity';
import { InsufficientInventoryError } from '../../../src/core/domain/inventory/errors/insufficient-inventory.error';
import { InvalidStockError } from '../../../src/core/domain/inventory/errors/invalid-stock.error';
import { Quantity } from '../../../src/core/domain/sale/value-objects/quantity.vo';

describe('InventoryRecord Entity', () => {
  const updatedAt = new Date('2026-01-01T00:00:00Z');
  const now = new Date('2026-03-10T09:30:00Z');

  const record = (quantityOnHand: number, reorderLevel = 0) =>
    InventoryRecord.reconstitute({
      id: 'inv-1',
      tenantId: 'tenant-1',
      branchId: 'branch-1',
      productId: 'product-1',
      quantityOnHand,
      reorderLevel,
      updatedAt,
    });

  it('should reconstitute with stored values', () => {
    const r = record(12, 4);
    expect(r.id).toBe('inv-1');
    expect(r.productId).toBe('product-1');
    expect(r.quantityOnHand.value).toBe(12);
    expect(r.reorderLevel.value).toBe(4);
    expect(r.updatedAt).toBe(updatedAt);
  });

  it('should reject a negative stored quantity', () => {
    expect(() => record(-1)).toThrow(InvalidStockError);
  });

  it('should deduct and stamp the update time', () => {
    const r = record(5);
    r.deduct(Quantity.create(3), now);
    expect(r.quantityOnHand.value).toBe(2);
    expect(r.updatedAt).toBe(now);
  });

  it('should allow deducting the full quantity', () => {
    const r = record(3);
    r.deduct(Quantity.create(3), now);
    expect(r.quantityOnHand.value).toBe(0);
  });

  it('should throw InsufficientInventoryError and leave stock unchanged', () => {
    const r = record(2);
    expect(() => r.deduct(Quantity.create(3), now)).toThrow(InsufficientInventoryError);
    expect(() => r.deduct(Quantity.create(3), now)).toThrow(
      'Insufficient inventory for product product-1',
    );
    expect(r.quantityOnHand.value).toBe(2);
    expect(r.updatedAt).toBe(updatedAt);
  });

  it('should report low stock at or below the reorder level', () => {
    expect(record(4, 4).isLowStock).toBe(true);
    expect(record(3, 4).isLowStock).toBe(true);
    expect(record(5, 4).isLowStock).toBe(false);
  });
});
