import { Inject, Injectable } from '@nestjs/common';
import {
  SALE_REPOSITORY,
  SaleRepository,
  SaleStats,
} from '@/core/domain/sale/repositories/sale.repository';

export interface SalesStatsQuery {
  tenantId: string;
  startDate?: Date;
  endDate?: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class GetSalesStatsUseCase {
  constructor(@Inject(SALE_REPOSITORY) private readonly saleRepo: SaleRepository) {}

  async execute(query: SalesStatsQuery, now: Date = new Date()): Promise<SaleStats> {
    const todayStart = new Date(
      Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()),
    );
    const todayEnd = new Date(todayStart.getTime() + DAY_MS);

    return this.saleRepo.stats({
      tenantId: query.tenantId,
      startDate: query.startDate,
      endDate: query.endDate,
      todayStart,
      todayEnd,
    });
  }
}
