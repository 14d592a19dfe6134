import { Sale } from '@/core/domain/sale/entities/sale.entity';
import {
  isPaymentMethod,
  isPaymentStatus,
  isSaleStatus,
} from '@/core/domain/sale/value-objects/sale-status.vo';
import { InfrastructureError } from '@/infrastructure/errors/infrastructure.error';
import { SaleOrmEntity } from '../entities/sale.orm-entity';
import { SaleItemOrmEntity } from '../entities/sale-item.orm-entity';

export type SaleRow = Omit<SaleOrmEntity, 'items' | 'createdAt' | 'deletedAt'>;
export type SaleItemRow = Omit<SaleItemOrmEntity, 'sale'>;

export function toSaleRow(sale: Sale): SaleRow {
  return {
    id: sale.id,
    tenantId: sale.tenantId,
    branchId: sale.branchId,
    saleNumber: sale.saleNumber.value,
    patientId: sale.patientId,
    cashierId: sale.cashierId,
    saleDate: sale.saleDate,
    subtotal: sale.subtotal.value,
    taxAmount: sale.taxAmount.value,
    discountAmount: sale.discountAmount.value,
    totalAmount: sale.totalAmount.value,
    paymentMethod: sale.paymentMethod,
    paymentStatus: sale.paymentStatus,
    status: sale.status,
    notes: sale.notes,
    updatedAt: sale.updatedAt,
  };
}

export function toSaleItemRows(sale: Sale): SaleItemRow[] {
  return sale.items.map((item, position) => ({
    id: item.id,
    saleId: sale.id,
    position,
    productId: item.productId,
    quantity: item.quantity.value,
    unitPrice: item.unitPrice.value,
    discountAmount: item.discountAmount.value,
    totalPrice: item.totalPrice.value,
  }));
}

export function toSale(row: SaleOrmEntity): Sale {
  const { paymentMethod, paymentStatus, status } = row;
  if (!isPaymentMethod(paymentMethod)) {
    throw unexpected('payment_method', paymentMethod, row.id);
  }
  if (!isPaymentStatus(paymentStatus)) {
    throw unexpected('payment_status', paymentStatus, row.id);
  }
  if (!isSaleStatus(status)) {
    throw unexpected('status', status, row.id);
  }

  const items = [...(row.items ?? [])].sort((a, b) => a.position - b.position);

  return Sale.reconstitute({
    id: row.id,
    tenantId: row.tenantId,
    branchId: row.branchId,
    saleNumber: row.saleNumber,
    patientId: row.patientId,
    cashierId: row.cashierId,
    saleDate: row.saleDate,
    subtotal: row.subtotal,
    taxAmount: row.taxAmount,
    discountAmount: row.discountAmount,
    totalAmount: row.totalAmount,
    paymentMethod,
    paymentStatus,
    status,
    notes: row.notes,
    items: items.map((item) => ({
      id: item.id,
      productId: item.productId,
      quantity: item.quantity,
      unitPrice: item.unitPrice,
      discountAmount: item.discountAmount,
      totalPrice: item.totalPrice,
    })),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  });
}

function unexpected(column: string, value: string, saleId: string): InfrastructureError {
  return new InfrastructureError(`Unexpected ${column} "${value}" stored for sale ${saleId}`);
}
