import { DomainError } from './domain.error';

export class InvalidSaleError extends DomainError {
  readonly code = 'INVALID_SALE';
  constructor(message: string) {
    super(message);
  }
}
