export enum SaleStatus {
  PENDING = 'pending',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  RETURNED = 'returned',
}

export enum PaymentStatus {
  PENDING = 'pending',
  PAID = 'paid',
  PARTIAL = 'partial',
  REFUNDED = 'refunded',
}

export enum PaymentMethod {
  CASH = 'cash',
  CARD = 'card',
  INSURANCE = 'insurance',
  MOBILE_MONEY = 'mobile_money',
}

const SALE_STATUSES: ReadonlySet<string> = new Set(Object.values(SaleStatus));
const PAYMENT_STATUSES: ReadonlySet<string> = new Set(Object.values(PaymentStatus));
const PAYMENT_METHODS: ReadonlySet<string> = new Set(Object.values(PaymentMethod));

export function isSaleStatus(value: string): value is SaleStatus {
  return SALE_STATUSES.has(value);
}

export function isPaymentStatus(value: string): value is PaymentStatus {
  return PAYMENT_STATUSES.has(value);
}

export function isPaymentMethod(value: string): value is PaymentMethod {
  return PAYMENT_METHODS.has(value);
}
