import { SaleRepository } from '../repositories/sale.repository';
import {
  SaleNumber,
  SALE_NUMBER_MAX_SUFFIX,
  SALE_NUMBER_MIN_SUFFIX,
} from '../value-objects/sale-number.vo';
import { SaleNumberExhaustedError } from '../errors/sale-number-exhausted.error';

export type RandomSource = () => number;

export const DEFAULT_SALE_NUMBER_ATTEMPTS = 10;

/**
 * Draws `SALE<year><suffix>` candidates and probes the store until one is free.
 * Gives up after `maxAttempts` collisions; the unique constraint on the sale
 * number column still guards the window between probe and insert.
 */
export class SaleNumberGenerator {
  constructor(
    private readonly saleRepo: Pick<SaleRepository, 'existsBySaleNumber'>,
    private readonly maxAttempts: number = DEFAULT_SALE_NUMBER_ATTEMPTS,
    private readonly random: RandomSource = Math.random,
  ) {}

  async next(now: Date): Promise<SaleNumber> {
    const year = now.getUTCFullYear();

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const candidate = SaleNumber.compose(year, this.drawSuffix());
      const taken = await this.saleRepo.existsBySaleNumber(candidate);
      if (!taken) {
        return candidate;
      }
    }

    throw new SaleNumberExhaustedError(this.maxAttempts);
  }

  private drawSuffix(): number {
    const span = SALE_NUMBER_MAX_SUFFIX - SALE_NUMBER_MIN_SUFFIX + 1;
    const offset = Math.min(span - 1, Math.floor(this.random() * span));
    return SALE_NUMBER_MIN_SUFFIX + offset;
  }
}
