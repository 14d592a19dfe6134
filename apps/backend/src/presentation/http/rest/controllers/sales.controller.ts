import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { CreateSaleUseCase } from '@/application/use-cases/sale/create-sale.use-case';
import { ListSalesUseCase } from '@/application/use-cases/sale/list-sales.use-case';
import { GetSaleUseCase } from '@/application/use-cases/sale/get-sale.use-case';
import { UpdateSaleUseCase } from '@/application/use-cases/sale/update-sale.use-case';
import { GetSalesStatsUseCase } from '@/application/use-cases/sale/get-sales-stats.use-case';
import { CreateSaleDto } from '@/application/dto/create-sale.dto';
import { UpdateSaleDto } from '@/application/dto/update-sale.dto';
import { DateRangeQueryDto, ListSalesQueryDto } from '@/application/dto/list-query.dto';
import { SaleResponseDto } from '@/application/dto/sale-response.dto';
import { Pagination } from '@/application/dto/pagination';
import { RequestContext } from '@/application/context/request-context';
import { SaleStats } from '@/core/domain/sale/repositories/sale.repository';
import { DomainError } from '@/core/domain/sale/errors/domain.error';
import { SaleNumberExhaustedError } from '@/core/domain/sale/errors/sale-number-exhausted.error';
import { InsufficientInventoryError } from '@/core/domain/inventory/errors/insufficient-inventory.error';
import { InventoryNotFoundError } from '@/core/domain/inventory/errors/inventory-not-found.error';
import { MetricsService, SaleOutcome } from '@/infrastructure/observability/metrics.service';
import { TenantContext } from '../decorators/tenant-context.decorator';

@Controller('api/v1/sales')
export class SalesController {
  constructor(
    private readonly createSaleUseCase: CreateSaleUseCase,
    private readonly listSalesUseCase: ListSalesUseCase,
    private readonly getSaleUseCase: GetSaleUseCase,
    private readonly updateSaleUseCase: UpdateSaleUseCase,
    private readonly getSalesStatsUseCase: GetSalesStatsUseCase,
    private readonly metrics: MetricsService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @TenantContext() context: RequestContext,
    @Body() dto: CreateSaleDto,
  ): Promise<SaleResponseDto> {
    try {
      const sale = await this.createSaleUseCase.execute({ context, ...dto });
      this.metrics.recordSaleOutcome('created', sale.items.length);
      return SaleResponseDto.from(sale);
    } catch (error) {
      this.metrics.recordSaleOutcome(outcomeOf(error));
      throw error;
    }
  }

  @Get()
  async list(
    @TenantContext() context: RequestContext,
    @Query() query: ListSalesQueryDto,
  ): Promise<{ sales: SaleResponseDto[]; pagination: Pagination }> {
    const result = await this.listSalesUseCase.execute({
      tenantId: context.tenantId,
      branchId: query.branchId,
      search: query.search,
      startDate: toDate(query.startDate),
      endDate: toDate(query.endDate),
      status: query.status,
      page: query.page,
      pageSize: query.pageSize,
    });

    return {
      sales: result.sales.map((sale) => SaleResponseDto.from(sale)),
      pagination: result.pagination,
    };
  }

  // Declared before ':id' so "stats" is not taken for an id.
  @Get('stats')
  async stats(
    @TenantContext() context: RequestContext,
    @Query() query: DateRangeQueryDto,
  ): Promise<SaleStats> {
    return this.getSalesStatsUseCase.execute({
      tenantId: context.tenantId,
      startDate: toDate(query.startDate),
      endDate: toDate(query.endDate),
    });
  }

  @Get(':id')
  async findOne(
    @TenantContext() context: RequestContext,
    @Param('id', new ParseUUIDPipe()) id: string,
  ): Promise<SaleResponseDto> {
    const sale = await this.getSaleUseCase.execute(context.tenantId, id);
    return SaleResponseDto.from(sale);
  }

  @Put(':id')
  async update(
    @TenantContext() context: RequestContext,
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body() dto: UpdateSaleDto,
  ): Promise<SaleResponseDto> {
    const sale = await this.updateSaleUseCase.execute({
      tenantId: context.tenantId,
      id,
      status: dto.status,
      paymentStatus: dto.paymentStatus,
      notes: dto.notes,
    });
    return SaleResponseDto.from(sale);
  }
}

function toDate(value: string | undefined): Date | undefined {
  return value ? new Date(value) : undefined;
}

function outcomeOf(error: unknown): SaleOutcome {
  if (error instanceof InsufficientInventoryError) {
    return 'insufficient_inventory';
  }
  if (error instanceof InventoryNotFoundError) {
    return 'inventory_not_found';
  }
  if (error instanceof SaleNumberExhaustedError) {
    return 'sale_number_exhausted';
  }
  return error instanceof DomainError ? 'rejected' : 'failed';
}
