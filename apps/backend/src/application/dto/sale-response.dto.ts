import { Sale } from '@/core/domain/sale/entities/sale.entity';
import { SaleLineItem } from '@/core/domain/sale/entities/sale-line-item.entity';
import {
  PaymentMethod,
  PaymentStatus,
  SaleStatus,
} from '@/core/domain/sale/value-objects/sale-status.vo';

export class SaleLineItemResponseDto {
  id!: string;
  productId!: string;
  quantity!: number;
  unitPrice!: number;
  discountAmount!: number;
  totalPrice!: number;

  static from(item: SaleLineItem): SaleLineItemResponseDto {
    const dto = new SaleLineItemResponseDto();
    dto.id = item.id;
    dto.productId = item.productId;
    dto.quantity = item.quantity.value;
    dto.unitPrice = item.unitPrice.value;
    dto.discountAmount = item.discountAmount.value;
    dto.totalPrice = item.totalPrice.value;
    return dto;
  }
}

export class SaleResponseDto {
  id!: string;
  tenantId!: string;
  branchId!: string;
  saleNumber!: string;
  patientId!: string | null;
  cashierId!: string;
  saleDate!: string;
  subtotal!: number;
  taxAmount!: number;
  discountAmount!: number;
  totalAmount!: number;
  paymentMethod!: PaymentMethod;
  paymentStatus!: PaymentStatus;
  status!: SaleStatus;
  notes!: string | null;
  items!: SaleLineItemResponseDto[];
  createdAt!: string;
  updatedAt!: string;

  static from(sale: Sale): SaleResponseDto {
    const dto = new SaleResponseDto();
    dto.id = sale.id;
    dto.tenantId = sale.tenantId;
    dto.branchId = sale.branchId;
    dto.saleNumber = sale.saleNumber.value;
    dto.patientId = sale.patientId;
    dto.cashierId = sale.cashierId;
    dto.saleDate = sale.saleDate.toISOString();
    dto.subtotal = sale.subtotal.value;
    dto.taxAmount = sale.taxAmount.value;
    dto.discountAmount = sale.discountAmount.value;
    dto.totalAmount = sale.totalAmount.value;
    dto.paymentMethod = sale.paymentMethod;
    dto.paymentStatus = sale.paymentStatus;
    dto.status = sale.status;
    dto.notes = sale.notes;
    dto.items = sale.items.map((item) => SaleLineItemResponseDto.from(item));
    dto.createdAt = sale.createdAt.toISOString();
    dto.updatedAt = sale.updatedAt.toISOString();
    return dto;
  }
}
