import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { InventoryOrmEntity } from '../entities/inventory.orm-entity';
import { toInventoryRecord } from '../mappers/inventory.mapper';
import {
  InventoryListCriteria,
  InventoryPage,
  InventoryRepository,
} from '@/core/domain/inventory/repositories/inventory.repository';
import { InventoryRecord } from '@/core/domain/inventory/entities/inventory-record.entity';

@Injectable()
export class PgInventoryRepository implements InventoryRepository {
  constructor(
    @InjectRepository(InventoryOrmEntity)
    private readonly repo: Repository<InventoryOrmEntity>,
  ) {}

  async findByProduct(
    tenantId: string,
    branchId: string,
    productId: string,
  ): Promise<InventoryRecord | null> {
    const row = await this.repo.findOne({ where: { tenantId, branchId, productId } });
    return row ? toInventoryRecord(row) : null;
  }

  async list(criteria: InventoryListCriteria): Promise<InventoryPage> {
    const qb = this.repo
      .createQueryBuilder('inventory')
      .where('inventory.tenantId = :tenantId', { tenantId: criteria.tenantId })
      .andWhere('inventory.branchId = :branchId', { branchId: criteria.branchId });

    if (criteria.lowStockOnly) {
      qb.andWhere('inventory.quantityOnHand <= inventory.reorderLevel');
    }

    const [rows, totalCount] = await qb
      .orderBy('inventory.productId', 'ASC')
      .skip((criteria.page - 1) * criteria.pageSize)
      .take(criteria.pageSize)
      .getManyAndCount();

    return { records: rows.map(toInventoryRecord), totalCount };
  }
}
