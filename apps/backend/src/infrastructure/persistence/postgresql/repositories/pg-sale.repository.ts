import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, Repository } from 'typeorm';
import { SaleOrmEntity } from '../entities/sale.orm-entity';
import { toSale } from '../mappers/sale.mapper';
import {
  SaleListCriteria,
  SalePage,
  SaleRepository,
  SaleStats,
  SaleStatsCriteria,
} from '@/core/domain/sale/repositories/sale.repository';
import { Sale } from '@/core/domain/sale/entities/sale.entity';
import { SaleNumber } from '@/core/domain/sale/value-objects/sale-number.vo';
import { SaleStatus } from '@/core/domain/sale/value-objects/sale-status.vo';

interface StatsRow {
  totalSales: string;
  totalRevenue: string;
  completedSales: string;
  pendingSales: string;
  todaySales: string;
  todayRevenue: string;
}

@Injectable()
export class PgSaleRepository implements SaleRepository {
  private readonly logger = new Logger(PgSaleRepository.name);

  constructor(
    @InjectRepository(SaleOrmEntity)
    private readonly repo: Repository<SaleOrmEntity>,
  ) {}

  async existsBySaleNumber(saleNumber: SaleNumber): Promise<boolean> {
    // Soft-deleted sales keep their number reserved.
    const count = await this.repo.count({
      where: { saleNumber: saleNumber.value },
      withDeleted: true,
    });
    return count > 0;
  }

  async findById(tenantId: string, id: string): Promise<Sale | null> {
    const row = await this.repo.findOne({
      where: { id, tenantId },
      relations: { items: true },
    });
    return row ? toSale(row) : null;
  }

  async list(criteria: SaleListCriteria): Promise<SalePage> {
    const qb = this.repo
      .createQueryBuilder('sale')
      .leftJoinAndSelect('sale.items', 'item')
      .where('sale.tenantId = :tenantId', { tenantId: criteria.tenantId });

    if (criteria.branchId) {
      qb.andWhere('sale.branchId = :branchId', { branchId: criteria.branchId });
    }
    if (criteria.search) {
      const pattern = `%${escapeLike(criteria.search)}%`;
      qb.andWhere(
        new Brackets((where) => {
          where
            .where('sale.saleNumber ILIKE :pattern', { pattern })
            .orWhere('CAST(sale.patientId AS text) ILIKE :pattern', { pattern });
        }),
      );
    }
    if (criteria.startDate) {
      qb.andWhere('sale.saleDate >= :startDate', { startDate: criteria.startDate });
    }
    if (criteria.endDate) {
      qb.andWhere('sale.saleDate <= :endDate', { endDate: criteria.endDate });
    }
    if (criteria.status) {
      qb.andWhere('sale.status = :status', { status: criteria.status });
    }

    // Ordering stays on the sale alias so skip/take pages over sales, not joined rows.
    const [rows, totalCount] = await qb
      .orderBy('sale.saleDate', 'DESC')
      .addOrderBy('sale.id', 'ASC')
      .skip((criteria.page - 1) * criteria.pageSize)
      .take(criteria.pageSize)
      .getManyAndCount();

    return { sales: rows.map(toSale), totalCount };
  }

  async update(sale: Sale): Promise<void> {
    await this.repo.update(
      { id: sale.id, tenantId: sale.tenantId },
      {
        status: sale.status,
        paymentStatus: sale.paymentStatus,
        notes: sale.notes,
        updatedAt: sale.updatedAt,
      },
    );
    this.logger.log(`Sale updated: saleNumber=${sale.saleNumber.value}`);
  }

  async stats(criteria: SaleStatsCriteria): Promise<SaleStats> {
    const today = 'sale.saleDate >= :todayStart AND sale.saleDate < :todayEnd';
    const qb = this.repo
      .createQueryBuilder('sale')
      .select('COUNT(*)', 'totalSales')
      .addSelect('COALESCE(SUM(sale.totalAmount), 0)', 'totalRevenue')
      .addSelect('COUNT(*) FILTER (WHERE sale.status = :completed)', 'completedSales')
      .addSelect('COUNT(*) FILTER (WHERE sale.status = :pending)', 'pendingSales')
      .addSelect(`COUNT(*) FILTER (WHERE ${today})`, 'todaySales')
      .addSelect(`COALESCE(SUM(sale.totalAmount) FILTER (WHERE ${today}), 0)`, 'todayRevenue')
      .where('sale.tenantId = :tenantId', { tenantId: criteria.tenantId })
      .setParameters({
        completed: SaleStatus.COMPLETED,
        pending: SaleStatus.PENDING,
        todayStart: criteria.todayStart,
        todayEnd: criteria.todayEnd,
      });

    if (criteria.startDate) {
      qb.andWhere('sale.saleDate >= :startDate', { startDate: criteria.startDate });
    }
    if (criteria.endDate) {
      qb.andWhere('sale.saleDate <= :endDate', { endDate: criteria.endDate });
    }

    const row = await qb.getRawOne<StatsRow>();

    return {
      totalSales: Number(row?.totalSales ?? 0),
      totalRevenue: Number(row?.totalRevenue ?? 0),
      completedSales: Number(row?.completedSales ?? 0),
      pendingSales: Number(row?.pendingSales ?? 0),
      todaySales: Number(row?.todaySales ?? 0),
      todayRevenue: Number(row?.todayRevenue ?? 0),
    };
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}
