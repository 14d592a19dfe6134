import { ArgumentsHost, BadRequestException, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { GlobalExceptionFilter } from '../../src/presentation/http/rest/filters/domain-exception.filter';
import { ValidationError, NotFoundError } from '../../src/application/errors/application.error';
import { InfrastructureError } from '../../src/infrastructure/errors/infrastructure.error';
import { InsufficientInventoryError } from '../../src/core/domain/inventory/errors/insufficient-inventory.error';
import { SaleNumberExhaustedError } from '../../src/core/domain/sale/errors/sale-number-exhausted.error';

describe('GlobalExceptionFilter', () => {
  let filter: GlobalExceptionFilter;
  let mockReply: { status: jest.Mock; send: jest.Mock };
  let mockHost: ArgumentsHost;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    filter = new GlobalExceptionFilter();
    mockReply = {
      status: jest.fn().mockReturnThis(),
      send: jest.fn(),
    };
    mockHost = {
      switchToHttp: () => ({
        getResponse: () => mockReply,
      }),
    } as unknown as ArgumentsHost;
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should map a business rule violation to 400 with its code and message', () => {
    filter.catch(new InsufficientInventoryError('product-1'), mockHost);

    expect(mockReply.status).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST);
    expect(mockReply.send).toHaveBeenCalledWith({
      success: false,
      error: {
        code: 'INSUFFICIENT_INVENTORY',
        message: 'Insufficient inventory for product product-1',
      },
    });
  });

  it('should map sale number exhaustion to 409', () => {
    filter.catch(new SaleNumberExhaustedError(10), mockHost);

    expect(mockReply.status).toHaveBeenCalledWith(HttpStatus.CONFLICT);
    expect(mockReply.send).toHaveBeenCalledWith({
      success: false,
      error: { code: 'SALE_NUMBER_EXHAUSTED', message: 'Unable to generate unique sale number' },
    });
  });

  it('should map ValidationError to 400 with fields', () => {
    filter.catch(new ValidationError('Invalid input', { items: 'Required' }), mockHost);

    expect(mockReply.status).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST);
    expect(mockReply.send).toHaveBeenCalledWith({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid input',
        fields: { items: 'Required' },
      },
    });
  });

  it('should omit fields when a ValidationError has none', () => {
    filter.catch(new ValidationError('Invalid input'), mockHost);

    const body = mockReply.send.mock.calls[0][0];
    expect(body.error.fields).toBeUndefined();
  });

  it('should map NotFoundError to 404', () => {
    filter.catch(NotFoundError.of('Sale', 'sale-1'), mockHost);

    expect(mockReply.status).toHaveBeenCalledWith(HttpStatus.NOT_FOUND);
    expect(mockReply.send).toHaveBeenCalledWith({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Sale sale-1 not found' },
    });
  });

  it('should map InfrastructureError to 503 without leaking details', () => {
    const error = new InfrastructureError('Transaction failed', new Error('ECONNREFUSED'));
    filter.catch(error, mockHost);

    expect(mockReply.status).toHaveBeenCalledWith(HttpStatus.SERVICE_UNAVAILABLE);
    expect(mockReply.send).toHaveBeenCalledWith({
      success: false,
      error: {
        code: 'SERVICE_UNAVAILABLE',
        message: 'Service temporarily unavailable. Please try again.',
      },
    });
    expect(errorSpy).toHaveBeenCalledWith('Infrastructure failure: Transaction failed', expect.any(String));
  });

  it('should join ValidationPipe messages into one VALIDATION_ERROR', () => {
    filter.catch(
      new BadRequestException(['items must contain at least 1 elements', 'totalAmount must not be less than 0']),
      mockHost,
    );

    expect(mockReply.send).toHaveBeenCalledWith({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'items must contain at least 1 elements; totalAmount must not be less than 0',
      },
    });
  });

  it('should map other HttpExceptions to HTTP_ERROR', () => {
    filter.catch(new HttpException('Gone', HttpStatus.GONE), mockHost);

    expect(mockReply.status).toHaveBeenCalledWith(HttpStatus.GONE);
    expect(mockReply.send).toHaveBeenCalledWith({
      success: false,
      error: { code: 'HTTP_ERROR', message: 'Gone' },
    });
  });

  it('should map unknown errors to 500 without leaking the message', () => {
    filter.catch(new Error('secret internals'), mockHost);

    expect(mockReply.status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
    expect(mockReply.send).toHaveBeenCalledWith({
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred.' },
    });
    expect(errorSpy).toHaveBeenCalledWith('Unhandled exception', expect.stringContaining('secret internals'));
  });
});
