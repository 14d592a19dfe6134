import { DomainEvent } from './domain-event.interface';

export class SaleCreatedEvent implements DomainEvent {
  readonly occurredOn = new Date();
  constructor(
    readonly saleId: string,
    readonly saleNumber: string,
    readonly tenantId: string,
    readonly branchId: string,
    readonly totalAmount: number,
    readonly itemCount: number,
  ) {}
}
