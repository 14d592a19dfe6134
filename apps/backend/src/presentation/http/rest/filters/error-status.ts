import { HttpException, HttpStatus } from '@nestjs/common';
import { DomainError } from '@/core/domain/sale/errors/domain.error';
import { ApplicationError, NotFoundError } from '@/application/errors/application.error';
import { InfrastructureError } from '@/infrastructure/errors/infrastructure.error';

// Domain errors not listed here are client errors (400).
const DOMAIN_ERROR_STATUS: Readonly<Record<string, HttpStatus>> = {
  SALE_NUMBER_EXHAUSTED: HttpStatus.CONFLICT,
};

export function resolveHttpStatus(exception: unknown): number {
  if (exception instanceof DomainError) {
    return DOMAIN_ERROR_STATUS[exception.code] ?? HttpStatus.BAD_REQUEST;
  }
  if (exception instanceof NotFoundError) {
    return HttpStatus.NOT_FOUND;
  }
  if (exception instanceof ApplicationError) {
    return HttpStatus.BAD_REQUEST;
  }
  if (exception instanceof InfrastructureError) {
    return HttpStatus.SERVICE_UNAVAILABLE;
  }
  if (exception instanceof HttpException) {
    return exception.getStatus();
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}
