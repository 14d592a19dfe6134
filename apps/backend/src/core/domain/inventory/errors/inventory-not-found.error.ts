import { DomainError } from '../../sale/errors/domain.error';

export class InventoryNotFoundError extends DomainError {
  readonly code = 'INVENTORY_NOT_FOUND';
  constructor(readonly productId: string) {
    super(`Inventory not found for product ${productId}`);
  }
}
