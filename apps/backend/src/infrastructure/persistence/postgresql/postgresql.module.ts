import { Module, Global } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { SaleOrmEntity } from './entities/sale.orm-entity';
import { SaleItemOrmEntity } from './entities/sale-item.orm-entity';
import { InventoryOrmEntity } from './entities/inventory.orm-entity';
import { PgSaleRepository } from './repositories/pg-sale.repository';
import { PgInventoryRepository } from './repositories/pg-inventory.repository';
import { TypeOrmUnitOfWork } from './typeorm-unit-of-work';
import { SALE_REPOSITORY } from '@/core/domain/sale/repositories/sale.repository';
import { INVENTORY_REPOSITORY } from '@/core/domain/inventory/repositories/inventory.repository';
import { UNIT_OF_WORK } from '@/application/ports/unit-of-work.port';
import { DATA_SOURCE } from '@/presentation/http/rest/controllers/health.controller';

const ENTITIES = [SaleOrmEntity, SaleItemOrmEntity, InventoryOrmEntity];

@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        url: configService.get<string>('DATABASE_URL'),
        entities: ENTITIES,
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') === 'development',
      }),
    }),
    TypeOrmModule.forFeature(ENTITIES),
  ],
  providers: [
    PgSaleRepository,
    PgInventoryRepository,
    TypeOrmUnitOfWork,
    {
      provide: SALE_REPOSITORY,
      useExisting: PgSaleRepository,
    },
    {
      provide: INVENTORY_REPOSITORY,
      useExisting: PgInventoryRepository,
    },
    {
      provide: UNIT_OF_WORK,
      useExisting: TypeOrmUnitOfWork,
    },
    {
      provide: DATA_SOURCE,
      useFactory: (dataSource: DataSource) => dataSource,
      inject: [DataSource],
    },
  ],
  exports: [SALE_REPOSITORY, INVENTORY_REPOSITORY, UNIT_OF_WORK, DATA_SOURCE],
})
export class PostgresqlModule {}
