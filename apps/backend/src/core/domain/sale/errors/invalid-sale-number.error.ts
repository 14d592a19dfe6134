import { DomainError } from './domain.error';

export class InvalidSaleNumberError extends DomainError {
  readonly code = 'INVALID_SALE_NUMBER';
  constructor(value: string) {
    super(`Invalid sale number format: "${value}". Expected SALE followed by year and 4 digits.`);
  }
}
