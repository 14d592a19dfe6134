import { Inject, Injectable } from '@nestjs/common';
import {
  INVENTORY_REPOSITORY,
  InventoryRepository,
} from '@/core/domain/inventory/repositories/inventory.repository';
import { InventoryRecord } from '@/core/domain/inventory/entities/inventory-record.entity';
import { Pagination, paginate } from '@/application/dto/pagination';
import { DEFAULT_PAGE_SIZE } from '@/application/use-cases/sale/list-sales.use-case';

export interface ListInventoryQuery {
  tenantId: string;
  branchId: string;
  lowStockOnly?: boolean;
  page?: number;
  pageSize?: number;
}

export interface InventoryListResult {
  records: InventoryRecord[];
  pagination: Pagination;
}

@Injectable()
export class ListInventoryUseCase {
  constructor(
    @Inject(INVENTORY_REPOSITORY) private readonly inventoryRepo: InventoryRepository,
  ) {}

  async execute(query: ListInventoryQuery): Promise<InventoryListResult> {
    const page = query.page ?? 1;
    const pageSize = query.pageSize ?? DEFAULT_PAGE_SIZE;

    const result = await this.inventoryRepo.list({
      tenantId: query.tenantId,
      branchId: query.branchId,
      lowStockOnly: query.lowStockOnly ?? false,
      page,
      pageSize,
    });

    return { records: result.records, pagination: paginate(page, pageSize, result.totalCount) };
  }
}
