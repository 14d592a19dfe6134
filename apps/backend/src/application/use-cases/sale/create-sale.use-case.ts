import { Inject, Injectable, Logger } from '@nestjs/common';
import { Sale } from '@/core/domain/sale/entities/sale.entity';
import { PaymentMethod } from '@/core/domain/sale/value-objects/sale-status.vo';
import { SaleNumberGenerator } from '@/core/domain/sale/services/sale-number-generator.service';
import { DomainEvent } from '@/core/domain/sale/events/domain-event.interface';
import { InventoryRecord } from '@/core/domain/inventory/entities/inventory-record.entity';
import { InventoryLowEvent } from '@/core/domain/inventory/events/inventory-low.event';
import { InventoryNotFoundError } from '@/core/domain/inventory/errors/inventory-not-found.error';
import { UNIT_OF_WORK, UnitOfWork } from '@/application/ports/unit-of-work.port';
import { EVENT_PUBLISHER, EventPublisher } from '@/application/ports/event-publisher.port';
import { RECEIPT_DISPATCH, ReceiptDispatchPort } from '@/application/ports/receipt-dispatch.port';
import { RequestContext } from '@/application/context/request-context';

export interface CreateSaleItemCommand {
  productId: string;
  quantity: number;
  unitPrice: number;
  discountAmount: number;
  totalPrice: number;
}

export interface CreateSaleCommand {
  context: RequestContext;
  patientId?: string | null;
  subtotal: number;
  taxAmount: number;
  discountAmount: number;
  totalAmount: number;
  paymentMethod: PaymentMethod;
  notes?: string | null;
  items: CreateSaleItemCommand[];
}

@Injectable()
export class CreateSaleUseCase {
  private readonly logger = new Logger(CreateSaleUseCase.name);

  constructor(
    @Inject(UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork,
    private readonly saleNumbers: SaleNumberGenerator,
    @Inject(EVENT_PUBLISHER) private readonly eventPublisher: EventPublisher,
    @Inject(RECEIPT_DISPATCH) private readonly receiptDispatch: ReceiptDispatchPort,
  ) {}

  async execute(command: CreateSaleCommand): Promise<Sale> {
    const { tenantId, branchId, userId } = command.context;
    const now = new Date();

    const saleNumber = await this.saleNumbers.next(now);

    const sale = Sale.create({
      tenantId,
      branchId,
      cashierId: userId,
      saleNumber,
      patientId: command.patientId ?? null,
      subtotal: command.subtotal,
      taxAmount: command.taxAmount,
      discountAmount: command.discountAmount,
      totalAmount: command.totalAmount,
      paymentMethod: command.paymentMethod,
      notes: command.notes ?? null,
      items: command.items,
      now,
    });

    const touched = await this.unitOfWork.run(async (tx) => {
      // One record per product, so repeated lines deduct cumulatively.
      const records = new Map<string, InventoryRecord>();

      for (const item of sale.items) {
        let record = records.get(item.productId);
        if (!record) {
          const loaded = await tx.inventory.findForUpdate(tenantId, branchId, item.productId);
          if (!loaded) {
            throw new InventoryNotFoundError(item.productId);
          }
          record = loaded;
          records.set(item.productId, record);
        }
        record.deduct(item.quantity, now);
      }

      await tx.sales.insert(sale);
      for (const record of records.values()) {
        await tx.inventory.save(record);
      }

      return [...records.values()];
    });

    this.logger.log(
      `Sale created: saleNumber=${sale.saleNumber.value}, tenant=${tenantId}, branch=${branchId}, items=${sale.items.length}`,
    );

    await this.notify(sale, touched);

    return sale;
  }

  // Runs after commit; a failure here must not fail the sale.
  private async notify(sale: Sale, records: InventoryRecord[]): Promise<void> {
    const events: DomainEvent[] = [
      ...sale.domainEvents,
      ...records
        .filter((record) => record.isLowStock)
        .map(
          (record) =>
            new InventoryLowEvent(
              record.tenantId,
              record.branchId,
              record.productId,
              record.quantityOnHand.value,
              record.reorderLevel.value,
            ),
        ),
    ];
    sale.clearEvents();

    for (const event of events) {
      try {
        await this.eventPublisher.publish(event);
      } catch (error) {
        this.logger.warn(
          `Failed to publish ${event.constructor.name} for sale ${sale.saleNumber.value}: ${errorMessage(error)}`,
        );
      }
    }

    try {
      await this.receiptDispatch.enqueue({
        saleId: sale.id,
        saleNumber: sale.saleNumber.value,
        tenantId: sale.tenantId,
        branchId: sale.branchId,
      });
    } catch (error) {
      this.logger.warn(
        `Failed to enqueue receipt for sale ${sale.saleNumber.value}: ${errorMessage(error)}`,
      );
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
