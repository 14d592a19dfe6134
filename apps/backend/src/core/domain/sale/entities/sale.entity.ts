import { randomUUID } from 'crypto';
import { SaleLineItem, SaleLineItemProps } from './sale-line-item.entity';
import { SaleNumber } from '../value-objects/sale-number.vo';
import { Money } from '../value-objects/money.vo';
import { PaymentMethod, PaymentStatus, SaleStatus } from '../value-objects/sale-status.vo';
import { DomainEvent } from '../events/domain-event.interface';
import { SaleCreatedEvent } from '../events/sale-created.event';
import { SaleUpdatedEvent } from '../events/sale-updated.event';
import { InvalidSaleError } from '../errors/invalid-sale.error';

export interface SaleTotals {
  subtotal: number;
  taxAmount: number;
  discountAmount: number;
  totalAmount: number;
}

export interface SaleChanges {
  status?: SaleStatus;
  paymentStatus?: PaymentStatus;
  notes?: string | null;
}

interface SaleProps {
  id: string;
  tenantId: string;
  branchId: string;
  saleNumber: SaleNumber;
  patientId: string | null;
  cashierId: string;
  saleDate: Date;
  subtotal: Money;
  taxAmount: Money;
  discountAmount: Money;
  totalAmount: Money;
  paymentMethod: PaymentMethod;
  paymentStatus: PaymentStatus;
  status: SaleStatus;
  notes: string | null;
  items: SaleLineItem[];
  createdAt: Date;
  updatedAt: Date;
}

export class Sale {
  private readonly _events: DomainEvent[] = [];

  private constructor(private readonly props: SaleProps) {}

  static create(
    props: SaleTotals & {
      tenantId: string;
      branchId: string;
      cashierId: string;
      saleNumber: SaleNumber;
      patientId: string | null;
      paymentMethod: PaymentMethod;
      notes: string | null;
      items: SaleLineItemProps[];
      now: Date;
    },
  ): Sale {
    if (props.items.length === 0) {
      throw new InvalidSaleError('A sale must contain at least one line item');
    }

    const sale = new Sale({
      id: randomUUID(),
      tenantId: props.tenantId,
      branchId: props.branchId,
      saleNumber: props.saleNumber,
      patientId: props.patientId,
      cashierId: props.cashierId,
      saleDate: props.now,
      ...Sale.totalsFrom(props),
      paymentMethod: props.paymentMethod,
      paymentStatus: PaymentStatus.PENDING,
      status: SaleStatus.PENDING,
      notes: props.notes,
      items: props.items.map((item) => SaleLineItem.create(item)),
      createdAt: props.now,
      updatedAt: props.now,
    });

    sale._events.push(
      new SaleCreatedEvent(
        sale.id,
        sale.saleNumber.value,
        sale.tenantId,
        sale.branchId,
        sale.totalAmount.value,
        sale.items.length,
      ),
    );
    return sale;
  }

  static reconstitute(
    props: SaleTotals & {
      id: string;
      tenantId: string;
      branchId: string;
      saleNumber: string;
      patientId: string | null;
      cashierId: string;
      saleDate: Date;
      paymentMethod: PaymentMethod;
      paymentStatus: PaymentStatus;
      status: SaleStatus;
      notes: string | null;
      items: Array<SaleLineItemProps & { id: string }>;
      createdAt: Date;
      updatedAt: Date;
    },
  ): Sale {
    return new Sale({
      id: props.id,
      tenantId: props.tenantId,
      branchId: props.branchId,
      saleNumber: SaleNumber.from(props.saleNumber),
      patientId: props.patientId,
      cashierId: props.cashierId,
      saleDate: props.saleDate,
      ...Sale.totalsFrom(props),
      paymentMethod: props.paymentMethod,
      paymentStatus: props.paymentStatus,
      status: props.status,
      notes: props.notes,
      items: props.items.map((item) => SaleLineItem.reconstitute(item)),
      createdAt: props.createdAt,
      updatedAt: props.updatedAt,
    });
  }

  private static totalsFrom(totals: SaleTotals) {
    return {
      subtotal: Money.create(totals.subtotal, 'subtotal'),
      taxAmount: Money.create(totals.taxAmount, 'taxAmount'),
      discountAmount: Money.create(totals.discountAmount, 'discountAmount'),
      totalAmount: Money.create(totals.totalAmount, 'totalAmount'),
    };
  }

  get id(): string {
    return this.props.id;
  }
  get tenantId(): string {
    return this.props.tenantId;
  }
  get branchId(): string {
    return this.props.branchId;
  }
  get saleNumber(): SaleNumber {
    return this.props.saleNumber;
  }
  get patientId(): string | null {
    return this.props.patientId;
  }
  get cashierId(): string {
    return this.props.cashierId;
  }
  get saleDate(): Date {
    return this.props.saleDate;
  }
  get subtotal(): Money {
    return this.props.subtotal;
  }
  get taxAmount(): Money {
    return this.props.taxAmount;
  }
  get discountAmount(): Money {
    return this.props.discountAmount;
  }
  get totalAmount(): Money {
    return this.props.totalAmount;
  }
  get paymentMethod(): PaymentMethod {
    return this.props.paymentMethod;
  }
  get paymentStatus(): PaymentStatus {
    return this.props.paymentStatus;
  }
  get status(): SaleStatus {
    return this.props.status;
  }
  get notes(): string | null {
    return this.props.notes;
  }
  get items(): ReadonlyArray<SaleLineItem> {
    return this.props.items;
  }
  get createdAt(): Date {
    return this.props.createdAt;
  }
  get updatedAt(): Date {
    return this.props.updatedAt;
  }
  get domainEvents(): ReadonlyArray<DomainEvent> {
    return this._events;
  }

  // Only status, payment status and notes change after creation.
  applyUpdate(changes: SaleChanges, now: Date): void {
    const statusChanged = changes.status !== undefined && changes.status !== this.props.status;
    const paymentChanged =
      changes.paymentStatus !== undefined && changes.paymentStatus !== this.props.paymentStatus;

    if (changes.status !== undefined) {
      this.props.status = changes.status;
    }
    if (changes.paymentStatus !== undefined) {
      this.props.paymentStatus = changes.paymentStatus;
    }
    if (changes.notes !== undefined) {
      this.props.notes = changes.notes;
    }
    this.props.updatedAt = now;

    if (statusChanged || paymentChanged) {
      this._events.push(
        new SaleUpdatedEvent(
          this.id,
          this.saleNumber.value,
          this.tenantId,
          this.branchId,
          this.props.status,
          this.props.paymentStatus,
        ),
      );
    }
  }

  clearEvents(): void {
    this._events.length = 0;
  }
}
