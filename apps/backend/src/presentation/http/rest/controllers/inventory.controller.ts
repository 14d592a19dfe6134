import { Controller, Get, Param, ParseUUIDPipe, Query } from '@nestjs/common';
import { ListInventoryUseCase } from '@/application/use-cases/inventory/list-inventory.use-case';
import { GetInventoryRecordUseCase } from '@/application/use-cases/inventory/get-inventory-record.use-case';
import { ListInventoryQueryDto } from '@/application/dto/list-query.dto';
import { InventoryRecordResponseDto } from '@/application/dto/inventory-response.dto';
import { Pagination } from '@/application/dto/pagination';
import { RequestContext } from '@/application/context/request-context';
import { TenantContext } from '../decorators/tenant-context.decorator';

@Controller('api/v1/inventory')
export class InventoryController {
  constructor(
    private readonly listInventoryUseCase: ListInventoryUseCase,
    private readonly getInventoryRecordUseCase: GetInventoryRecordUseCase,
  ) {}

  @Get()
  async list(
    @TenantContext() context: RequestContext,
    @Query() query: ListInventoryQueryDto,
  ): Promise<{ records: InventoryRecordResponseDto[]; pagination: Pagination }> {
    const result = await this.listInventoryUseCase.execute({
      tenantId: context.tenantId,
      branchId: context.branchId,
      lowStockOnly: query.lowStockOnly,
      page: query.page,
      pageSize: query.pageSize,
    });

    return {
      records: result.records.map((record) => InventoryRecordResponseDto.from(record)),
      pagination: result.pagination,
    };
  }

  @Get(':productId')
  async findOne(
    @TenantContext() context: RequestContext,
    @Param('productId', new ParseUUIDPipe()) productId: string,
  ): Promise<InventoryRecordResponseDto> {
    const record = await this.getInventoryRecordUseCase.execute(
      context.tenantId,
      context.branchId,
      productId,
    );
    return InventoryRecordResponseDto.from(record);
  }
}
