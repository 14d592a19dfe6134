import { DomainError } from './domain.error';

export class SaleNumberExhaustedError extends DomainError {
  readonly code = 'SALE_NUMBER_EXHAUSTED';
  constructor(readonly attempts: number) {
    super('Unable to generate unique sale number');
  }
}
