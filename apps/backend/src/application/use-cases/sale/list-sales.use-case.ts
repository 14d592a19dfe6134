import { Inject, Injectable } from '@nestjs/common';
import { SALE_REPOSITORY, SaleRepository } from '@/core/domain/sale/repositories/sale.repository';
import { Sale } from '@/core/domain/sale/entities/sale.entity';
import { SaleStatus } from '@/core/domain/sale/value-objects/sale-status.vo';
import { Pagination, paginate } from '@/application/dto/pagination';

export const DEFAULT_PAGE_SIZE = 50;

export interface ListSalesQuery {
  tenantId: string;
  branchId?: string;
  search?: string;
  startDate?: Date;
  endDate?: Date;
  status?: SaleStatus;
  page?: number;
  pageSize?: number;
}

export interface SaleListResult {
  sales: Sale[];
  pagination: Pagination;
}

@Injectable()
export class ListSalesUseCase {
  constructor(@Inject(SALE_REPOSITORY) private readonly saleRepo: SaleRepository) {}

  async execute(query: ListSalesQuery): Promise<SaleListResult> {
    const page = query.page ?? 1;
    const pageSize = query.pageSize ?? DEFAULT_PAGE_SIZE;
    const search = query.search?.trim();

    const result = await this.saleRepo.list({
      tenantId: query.tenantId,
      branchId: query.branchId,
      search: search ? search : undefined,
      startDate: query.startDate,
      endDate: query.endDate,
      status: query.status,
      page,
      pageSize,
    });

    return { sales: result.sales, pagination: paginate(page, pageSize, result.totalCount) };
  }
}
