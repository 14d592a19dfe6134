import { DomainEvent } from './domain-event.interface';
import { PaymentStatus, SaleStatus } from '../value-objects/sale-status.vo';

export class SaleUpdatedEvent implements DomainEvent {
  readonly occurredOn = new Date();
  constructor(
    readonly saleId: string,
    readonly saleNumber: string,
    readonly tenantId: string,
    readonly branchId: string,
    readonly status: SaleStatus,
    readonly paymentStatus: PaymentStatus,
  ) {}
}
