import { InventoryRecord } from '../entities/inventory-record.entity';

export const INVENTORY_REPOSITORY = Symbol('INVENTORY_REPOSITORY');

export interface InventoryRepository {
  findByProduct(tenantId: string, branchId: string, productId: string): Promise<InventoryRecord | null>;
  list(criteria: InventoryListCriteria): Promise<InventoryPage>;
}

export interface InventoryListCriteria {
  tenantId: string;
  branchId: string;
  lowStockOnly: boolean;
  page: number;
  pageSize: number;
}

export interface InventoryPage {
  records: InventoryRecord[];
  totalCount: number;
}
