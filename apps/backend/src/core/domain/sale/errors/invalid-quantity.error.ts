import { DomainError } from './domain.error';

export class InvalidQuantityError extends DomainError {
  readonly code = 'INVALID_QUANTITY';
  constructor(quantity: number) {
    super(`Invalid quantity: ${quantity}. Must be a positive integer.`);
  }
}
