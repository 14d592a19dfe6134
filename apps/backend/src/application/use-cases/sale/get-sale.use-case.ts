import { Inject, Injectable } from '@nestjs/common';
import { SALE_REPOSITORY, SaleRepository } from '@/core/domain/sale/repositories/sale.repository';
import { Sale } from '@/core/domain/sale/entities/sale.entity';
import { NotFoundError } from '@/application/errors/application.error';

@Injectable()
export class GetSaleUseCase {
  constructor(@Inject(SALE_REPOSITORY) private readonly saleRepo: SaleRepository) {}

  async execute(tenantId: string, id: string): Promise<Sale> {
    const sale = await this.saleRepo.findById(tenantId, id);
    if (!sale) {
      throw NotFoundError.of('Sale', id);
    }
    return sale;
  }
}
