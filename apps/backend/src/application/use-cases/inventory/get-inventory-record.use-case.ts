import { Inject, Injectable } from '@nestjs/common';
import {
  INVENTORY_REPOSITORY,
  InventoryRepository,
} from '@/core/domain/inventory/repositories/inventory.repository';
import { InventoryRecord } from '@/core/domain/inventory/entities/inventory-record.entity';
import { NotFoundError } from '@/application/errors/application.error';

@Injectable()
export class GetInventoryRecordUseCase {
  constructor(
    @Inject(INVENTORY_REPOSITORY) private readonly inventoryRepo: InventoryRepository,
  ) {}

  async execute(tenantId: string, branchId: string, productId: string): Promise<InventoryRecord> {
    const record = await this.inventoryRepo.findByProduct(tenantId, branchId, productId);
    if (!record) {
      throw new NotFoundError(`Inventory not found for product ${productId}`);
    }
    return record;
  }
}
