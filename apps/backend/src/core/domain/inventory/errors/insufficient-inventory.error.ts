import { DomainError } from '../../sale/errors/domain.error';

export class InsufficientInventoryError extends DomainError {
  readonly code = 'INSUFFICIENT_INVENTORY';
  constructor(readonly productId: string) {
    super(`Insufficient inventory for product ${productId}`);
  }
}
