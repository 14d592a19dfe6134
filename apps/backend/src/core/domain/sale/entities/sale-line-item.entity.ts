import { randomUUID } from 'crypto';
import { Quantity } from '../value-objects/quantity.vo';
import { Money } from '../value-objects/money.vo';
import { InvalidSaleError } from '../errors/invalid-sale.error';

export interface SaleLineItemProps {
  productId: string;
  quantity: number;
  unitPrice: number;
  discountAmount: number;
  totalPrice: number;
}

export class SaleLineItem {
  private constructor(
    private readonly _id: string,
    private readonly _productId: string,
    private readonly _quantity: Quantity,
    private readonly _unitPrice: Money,
    private readonly _discountAmount: Money,
    private readonly _totalPrice: Money,
  ) {}

  static create(props: SaleLineItemProps): SaleLineItem {
    return SaleLineItem.reconstitute({ id: randomUUID(), ...props });
  }

  static reconstitute(props: SaleLineItemProps & { id: string }): SaleLineItem {
    const productId = props.productId.trim();
    if (productId.length === 0) {
      throw new InvalidSaleError('Line item product id must be a non-empty string');
    }
    return new SaleLineItem(
      props.id,
      productId,
      Quantity.create(props.quantity),
      Money.create(props.unitPrice, 'unitPrice'),
      Money.create(props.discountAmount, 'discountAmount'),
      Money.create(props.totalPrice, 'totalPrice'),
    );
  }

  get id(): string {
    return this._id;
  }
  get productId(): string {
    return this._productId;
  }
  get quantity(): Quantity {
    return this._quantity;
  }
  get unitPrice(): Money {
    return this._unitPrice;
  }
  get discountAmount(): Money {
    return this._discountAmount;
  }
  get totalPrice(): Money {
    return this._totalPrice;
  }
}
