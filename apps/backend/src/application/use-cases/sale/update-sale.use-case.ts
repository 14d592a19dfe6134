import { Inject, Injectable, Logger } from '@nestjs/common';
import { SALE_REPOSITORY, SaleRepository } from '@/core/domain/sale/repositories/sale.repository';
import { Sale } from '@/core/domain/sale/entities/sale.entity';
import { PaymentStatus, SaleStatus } from '@/core/domain/sale/value-objects/sale-status.vo';
import { EVENT_PUBLISHER, EventPublisher } from '@/application/ports/event-publisher.port';
import { NotFoundError } from '@/application/errors/application.error';

export interface UpdateSaleCommand {
  tenantId: string;
  id: string;
  status?: SaleStatus;
  paymentStatus?: PaymentStatus;
  notes?: string | null;
}

@Injectable()
export class UpdateSaleUseCase {
  private readonly logger = new Logger(UpdateSaleUseCase.name);

  constructor(
    @Inject(SALE_REPOSITORY) private readonly saleRepo: SaleRepository,
    @Inject(EVENT_PUBLISHER) private readonly eventPublisher: EventPublisher,
  ) {}

  async execute(command: UpdateSaleCommand): Promise<Sale> {
    const sale = await this.saleRepo.findById(command.tenantId, command.id);
    if (!sale) {
      throw NotFoundError.of('Sale', command.id);
    }

    sale.applyUpdate(
      { status: command.status, paymentStatus: command.paymentStatus, notes: command.notes },
      new Date(),
    );
    await this.saleRepo.update(sale);

    this.logger.log(
      `Sale updated: saleNumber=${sale.saleNumber.value}, status=${sale.status}, paymentStatus=${sale.paymentStatus}`,
    );

    for (const event of sale.domainEvents) {
      try {
        await this.eventPublisher.publish(event);
      } catch (error) {
        this.logger.warn(
          `Failed to publish ${event.constructor.name} for sale ${sale.saleNumber.value}: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      }
    }
    sale.clearEvents();

    return sale;
  }
}
