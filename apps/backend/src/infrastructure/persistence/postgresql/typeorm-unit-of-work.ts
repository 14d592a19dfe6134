import { Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager, QueryRunner } from 'typeorm';
import {
  TransactionScope,
  UnitOfWork,
} from '@/application/ports/unit-of-work.port';
import { DomainError } from '@/core/domain/sale/errors/domain.error';
import { ApplicationError } from '@/application/errors/application.error';
import { InfrastructureError } from '@/infrastructure/errors/infrastructure.error';
import { InventoryOrmEntity } from './entities/inventory.orm-entity';
import { SaleOrmEntity } from './entities/sale.orm-entity';
import { SaleItemOrmEntity } from './entities/sale-item.orm-entity';
import { toInventoryRecord } from './mappers/inventory.mapper';
import { toSaleItemRows, toSaleRow } from './mappers/sale.mapper';

/**
 * One QueryRunner per `run` call. Inventory rows are read with
 * `SELECT ... FOR UPDATE`, so concurrent sales on the same product serialize
 * in PostgreSQL.
 */
@Injectable()
export class TypeOrmUnitOfWork implements UnitOfWork {
  private readonly logger = new Logger(TypeOrmUnitOfWork.name);

  constructor(private readonly dataSource: DataSource) {}

  async run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    const runner = this.dataSource.createQueryRunner();
    try {
      await runner.connect();
      await runner.startTransaction();

      const result = await work(this.scopeFor(runner.manager));

      await runner.commitTransaction();
      return result;
    } catch (error) {
      await this.rollback(runner);
      if (error instanceof DomainError || error instanceof ApplicationError) {
        throw error;
      }
      throw InfrastructureError.wrap('Transaction failed and was rolled back', error);
    } finally {
      await runner.release();
    }
  }

  private async rollback(runner: QueryRunner): Promise<void> {
    if (!runner.isTransactionActive) {
      return;
    }
    try {
      await runner.rollbackTransaction();
    } catch (rollbackError) {
      this.logger.error('Rollback failed', rollbackError);
    }
  }

  private scopeFor(manager: EntityManager): TransactionScope {
    return {
      inventory: {
        findForUpdate: async (tenantId, branchId, productId) => {
          const row = await manager.findOne(InventoryOrmEntity, {
            where: { tenantId, branchId, productId },
            lock: { mode: 'pessimistic_write' },
          });
          return row ? toInventoryRecord(row) : null;
        },
        save: async (record) => {
          await manager.update(
            InventoryOrmEntity,
            { id: record.id },
            { quantityOnHand: record.quantityOnHand.value, updatedAt: record.updatedAt },
          );
        },
      },
      sales: {
        insert: async (sale) => {
          await manager.insert(SaleOrmEntity, toSaleRow(sale));
          await manager.insert(SaleItemOrmEntity, toSaleItemRows(sale));
        },
      },
    };
  }
}
