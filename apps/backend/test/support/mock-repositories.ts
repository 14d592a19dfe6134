import { SaleRepository } from '../../src/core/domain/sale/repositories/sale.repository';
import { InventoryRepository } from '../../src/core/domain/inventory/repositories/inventory.repository';

export function mockSaleRepository(): jest.Mocked<SaleRepository> {
  return {
    existsBySaleNumber: jest.fn(),
    findById: jest.fn(),
    list: jest.fn(),
    update: jest.fn().mockResolvedValue(undefined),
    stats: jest.fn(),
  };
}

export function mockInventoryRepository(): jest.Mocked<InventoryRepository> {
  return {
    findByProduct: jest.fn(),
    list: jest.fn(),
  };
}
