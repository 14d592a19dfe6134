import { DomainError } from './domain.error';

export class InvalidAmountError extends DomainError {
  readonly code = 'INVALID_AMOUNT';
  constructor(field: string, amount: number) {
    super(`Invalid ${field}: ${amount}. Must be a non-negative amount.`);
  }
}
