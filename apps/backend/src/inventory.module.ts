import { Module } from '@nestjs/common';
import { InventoryController } from './presentation/http/rest/controllers/inventory.controller';
import { ListInventoryUseCase } from './application/use-cases/inventory/list-inventory.use-case';
import { GetInventoryRecordUseCase } from './application/use-cases/inventory/get-inventory-record.use-case';

@Module({
  controllers: [InventoryController],
  providers: [ListInventoryUseCase, GetInventoryRecordUseCase],
})
export class InventoryModule {}
