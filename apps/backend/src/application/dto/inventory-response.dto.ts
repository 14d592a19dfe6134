import { InventoryRecord } from '@/core/domain/inventory/entities/inventory-record.entity';

export class InventoryRecordResponseDto {
  id!: string;
  branchId!: string;
  productId!: string;
  quantityOnHand!: number;
  reorderLevel!: number;
  lowStock!: boolean;
  updatedAt!: string;

  static from(record: InventoryRecord): InventoryRecordResponseDto {
    const dto = new InventoryRecordResponseDto();
    dto.id = record.id;
    dto.branchId = record.branchId;
    dto.productId = record.productId;
    dto.quantityOnHand = record.quantityOnHand.value;
    dto.reorderLevel = record.reorderLevel.value;
    dto.lowStock = record.isLowStock;
    dto.updatedAt = record.updatedAt.toISOString();
    return dto;
  }
}
