import {
  ArrayMinSize,
  IsArray,
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUUID,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { PaymentMethod } from '@/core/domain/sale/value-objects/sale-status.vo';

const MONEY = { maxDecimalPlaces: 2, allowNaN: false, allowInfinity: false };
// Largest value a numeric(12,2) column holds.
export const MAX_AMOUNT = 9999999999.99;

export class CreateSaleItemDto {
  @IsUUID()
  productId!: string;

  @IsInt()
  @Min(1)
  quantity!: number;

  @IsNumber(MONEY)
  @Min(0)
  @Max(MAX_AMOUNT)
  unitPrice!: number;

  @IsNumber(MONEY)
  @Min(0)
  @Max(MAX_AMOUNT)
  discountAmount!: number;

  @IsNumber(MONEY)
  @Min(0)
  @Max(MAX_AMOUNT)
  totalPrice!: number;
}

export class CreateSaleDto {
  @IsOptional()
  @IsUUID()
  patientId?: string;

  @IsNumber(MONEY)
  @Min(0)
  @Max(MAX_AMOUNT)
  subtotal!: number;

  @IsNumber(MONEY)
  @Min(0)
  @Max(MAX_AMOUNT)
  taxAmount!: number;

  @IsNumber(MONEY)
  @Min(0)
  @Max(MAX_AMOUNT)
  discountAmount!: number;

  @IsNumber(MONEY)
  @Min(0)
  @Max(MAX_AMOUNT)
  totalAmount!: number;

  @IsEnum(PaymentMethod)
  paymentMethod!: PaymentMethod;

  @IsOptional()
  @IsString()
  @MaxLength(1000)
  notes?: string;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => CreateSaleItemDto)
  items!: CreateSaleItemDto[];
}
