import { IsEnum, IsOptional, IsString, MaxLength } from 'class-validator';
import { PaymentStatus, SaleStatus } from '@/core/domain/sale/value-objects/sale-status.vo';

export class UpdateSaleDto {
  @IsOptional()
  @IsEnum(SaleStatus)
  status?: SaleStatus;

  @IsOptional()
  @IsEnum(PaymentStatus)
  paymentStatus?: PaymentStatus;

  @IsOptional()
  @IsString()
  @MaxLength(1000)
  notes?: string;
}
