import { DomainEvent } from '@/core/domain/sale/events/domain-event.interface';
import { SaleCreatedEvent } from '@/core/domain/sale/events/sale-created.event';
import { SaleUpdatedEvent } from '@/core/domain/sale/events/sale-updated.event';
import { InventoryLowEvent } from '@/core/domain/inventory/events/inventory-low.event';

export const PORTAL_EVENTS_CHANNEL = 'portal:events';

export type PortalEventName = 'sale.created' | 'sale.updated' | 'inventory.low';

export interface PortalMessage {
  event: PortalEventName;
  tenantId: string;
  branchId: string;
  data: Record<string, unknown>;
  occurredOn: string;
}

/** Returns null for events that are not broadcast to the portals. */
export function toPortalMessage(event: DomainEvent): PortalMessage | null {
  const occurredOn = event.occurredOn.toISOString();

  if (event instanceof SaleCreatedEvent) {
    return {
      event: 'sale.created',
      tenantId: event.tenantId,
      branchId: event.branchId,
      data: {
        saleId: event.saleId,
        saleNumber: event.saleNumber,
        totalAmount: event.totalAmount,
        itemCount: event.itemCount,
      },
      occurredOn,
    };
  }
  if (event instanceof SaleUpdatedEvent) {
    return {
      event: 'sale.updated',
      tenantId: event.tenantId,
      branchId: event.branchId,
      data: {
        saleId: event.saleId,
        saleNumber: event.saleNumber,
        status: event.status,
        paymentStatus: event.paymentStatus,
      },
      occurredOn,
    };
  }
  if (event instanceof InventoryLowEvent) {
    return {
      event: 'inventory.low',
      tenantId: event.tenantId,
      branchId: event.branchId,
      data: {
        productId: event.productId,
        quantityOnHand: event.quantityOnHand,
        reorderLevel: event.reorderLevel,
      },
      occurredOn,
    };
  }
  return null;
}
