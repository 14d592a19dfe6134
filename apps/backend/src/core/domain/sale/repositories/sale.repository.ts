import { Sale } from '../entities/sale.entity';
import { SaleNumber } from '../value-objects/sale-number.vo';
import { SaleStatus } from '../value-objects/sale-status.vo';

export const SALE_REPOSITORY = Symbol('SALE_REPOSITORY');

export interface SaleRepository {
  existsBySaleNumber(saleNumber: SaleNumber): Promise<boolean>;
  findById(tenantId: string, id: string): Promise<Sale | null>;
  list(criteria: SaleListCriteria): Promise<SalePage>;
  update(sale: Sale): Promise<void>;
  stats(criteria: SaleStatsCriteria): Promise<SaleStats>;
}

export interface SaleListCriteria {
  tenantId: string;
  branchId?: string;
  search?: string;
  startDate?: Date;
  endDate?: Date;
  status?: SaleStatus;
  page: number;
  pageSize: number;
}

export interface SalePage {
  sales: Sale[];
  totalCount: number;
}

export interface SaleStatsCriteria {
  tenantId: string;
  startDate?: Date;
  endDate?: Date;
  todayStart: Date;
  todayEnd: Date;
}

export interface SaleStats {
  totalSales: number;
  totalRevenue: number;
  completedSales: number;
  pendingSales: number;
  todaySales: number;
  todayRevenue: number;
}
