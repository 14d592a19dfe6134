import { InventoryRecord } from '@/core/domain/inventory/entities/inventory-record.entity';
import { InventoryOrmEntity } from '../entities/inventory.orm-entity';

export function toInventoryRecord(row: InventoryOrmEntity): InventoryRecord {
  return InventoryRecord.reconstitute({
    id: row.id,
    tenantId: row.tenantId,
    branchId: row.branchId,
    productId: row.productId,
    quantityOnHand: row.quantityOnHand,
    reorderLevel: row.reorderLevel,
    updatedAt: row.updatedAt,
  });
}
