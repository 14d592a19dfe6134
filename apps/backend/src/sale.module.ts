import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SalesController } from './presentation/http/rest/controllers/sales.controller';
import { CreateSaleUseCase } from './application/use-cases/sale/create-sale.use-case';
import { ListSalesUseCase } from './application/use-cases/sale/list-sales.use-case';
import { GetSaleUseCase } from './application/use-cases/sale/get-sale.use-case';
import { UpdateSaleUseCase } from './application/use-cases/sale/update-sale.use-case';
import { GetSalesStatsUseCase } from './application/use-cases/sale/get-sales-stats.use-case';
import {
  DEFAULT_SALE_NUMBER_ATTEMPTS,
  SaleNumberGenerator,
} from './core/domain/sale/services/sale-number-generator.service';
import { SALE_REPOSITORY, SaleRepository } from './core/domain/sale/repositories/sale.repository';

@Module({
  controllers: [SalesController],
  providers: [
    {
      provide: SaleNumberGenerator,
      useFactory: (saleRepo: SaleRepository, configService: ConfigService) =>
        new SaleNumberGenerator(
          saleRepo,
          configService.get<number>('SALE_NUMBER_MAX_ATTEMPTS', DEFAULT_SALE_NUMBER_ATTEMPTS),
        ),
      inject: [SALE_REPOSITORY, ConfigService],
    },
    CreateSaleUseCase,
    ListSalesUseCase,
    GetSaleUseCase,
    UpdateSaleUseCase,
    GetSalesStatsUseCase,
  ],
})
export class SaleModule {}
