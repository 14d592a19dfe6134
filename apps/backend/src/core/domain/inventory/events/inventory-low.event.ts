import { DomainEvent } from '../../sale/events/domain-event.interface';

export class InventoryLowEvent implements DomainEvent {
  readonly occurredOn = new Date();
  constructor(
    readonly tenantId: string,
    readonly branchId: string,
    readonly productId: string,
    readonly quantityOnHand: number,
    readonly reorderLevel: number,
  ) {}
}
