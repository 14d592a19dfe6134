import { ExceptionFilter, Catch, ArgumentsHost, HttpStatus, HttpException, Logger } from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { DomainError } from '../../../../core/domain/sale/errors/domain.error';
import {
  ApplicationError,
  ValidationError,
} from '../../../../application/errors/application.error';
import { InfrastructureError } from '../../../../infrastructure/errors/infrastructure.error';
import { resolveHttpStatus } from './error-status';

interface ErrorResponseBody {
  success: false;
  error: {
    code: string;
    message: string;
    fields?: Record<string, string>;
  };
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const status = resolveHttpStatus(exception);

    if (exception instanceof DomainError) {
      reply.status(status).send({
        success: false,
        error: { code: exception.code, message: exception.message },
      } satisfies ErrorResponseBody);
      return;
    }

    if (exception instanceof ApplicationError) {
      const fields = exception instanceof ValidationError ? exception.fields : undefined;
      reply.status(status).send({
        success: false,
        error: {
          code: exception.code,
          message: exception.message,
          ...(fields && { fields }),
        },
      } satisfies ErrorResponseBody);
      return;
    }

    if (exception instanceof InfrastructureError) {
      this.logger.error(
        `Infrastructure failure: ${exception.message}`,
        exception.cause?.stack ?? exception.stack,
      );
      reply.status(status).send({
        success: false,
        error: {
          code: 'SERVICE_UNAVAILABLE',
          message: 'Service temporarily unavailable. Please try again.',
        },
      } satisfies ErrorResponseBody);
      return;
    }

    // NestJS built-in HTTP exceptions (BadRequestException from ValidationPipe, etc.)
    if (exception instanceof HttpException) {
      const response = exception.getResponse();
      const message = typeof response === 'string' ? response : extractMessage(response);
      reply.status(status).send({
        success: false,
        error: {
          code: status === HttpStatus.BAD_REQUEST ? 'VALIDATION_ERROR' : 'HTTP_ERROR',
          message: message ?? exception.message,
        },
      } satisfies ErrorResponseBody);
      return;
    }

    // Unexpected errors: log, never leak internals
    this.logger.error('Unhandled exception', exception instanceof Error ? exception.stack : exception);
    reply.status(status).send({
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred.',
      },
    } satisfies ErrorResponseBody);
  }
}

function extractMessage(response: object): string | undefined {
  if (!('message' in response)) {
    return undefined;
  }
  const { message } = response;
  if (typeof message === 'string') {
    return message;
  }
  if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) {
    return message.join('; ');
  }
  return undefined;
}
