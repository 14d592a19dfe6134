import { Stock } from '../value-objects/stock.vo';
import { Quantity } from '../../sale/value-objects/quantity.vo';
import { InsufficientInventoryError } from '../errors/insufficient-inventory.error';

export class InventoryRecord {
  private constructor(
    private readonly _id: string,
    private readonly _tenantId: string,
    private readonly _branchId: string,
    private readonly _productId: string,
    private _quantityOnHand: Stock,
    private readonly _reorderLevel: Stock,
    private _updatedAt: Date,
  ) {}

  static reconstitute(props: {
    id: string;
    tenantId: string;
    branchId: string;
    productId: string;
    quantityOnHand: number;
    reorderLevel: number;
    updatedAt: Date;
  }): InventoryRecord {
    return new InventoryRecord(
      props.id,
      props.tenantId,
      props.branchId,
      props.productId,
      Stock.create(props.quantityOnHand),
      Stock.create(props.reorderLevel),
      props.updatedAt,
    );
  }

  get id(): string {
    return this._id;
  }
  get tenantId(): string {
    return this._tenantId;
  }
  get branchId(): string {
    return this._branchId;
  }
  get productId(): string {
    return this._productId;
  }
  get quantityOnHand(): Stock {
    return this._quantityOnHand;
  }
  get reorderLevel(): Stock {
    return this._reorderLevel;
  }
  get updatedAt(): Date {
    return this._updatedAt;
  }

  get isLowStock(): boolean {
    return this._quantityOnHand.value <= this._reorderLevel.value;
  }

  deduct(quantity: Quantity, now: Date): void {
    if (!this._quantityOnHand.covers(quantity.value)) {
      throw new InsufficientInventoryError(this._productId);
    }
    this._quantityOnHand = this._quantityOnHand.subtract(quantity.value);
    this._updatedAt = now;
  }
}
