import { Sale } from '@/core/domain/sale/entities/sale.entity';
import { InventoryRecord } from '@/core/domain/inventory/entities/inventory-record.entity';

export const UNIT_OF_WORK = Symbol('UNIT_OF_WORK');

export interface TransactionalInventoryStore {
  /** Loads a live record and holds a row lock on it until the scope ends. */
  findForUpdate(
    tenantId: string,
    branchId: string,
    productId: string,
  ): Promise<InventoryRecord | null>;
  save(record: InventoryRecord): Promise<void>;
}

export interface TransactionalSaleStore {
  insert(sale: Sale): Promise<void>;
}

export interface TransactionScope {
  readonly inventory: TransactionalInventoryStore;
  readonly sales: TransactionalSaleStore;
}

/**
 * Runs `work` inside one transaction. Commits when it resolves, rolls back and
 * rethrows when it rejects, and releases the underlying connection either way.
 */
export interface UnitOfWork {
  run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T>;
}
