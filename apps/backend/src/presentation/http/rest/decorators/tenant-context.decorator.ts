import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import { isUUID } from 'class-validator';
import { RequestContext } from '@/application/context/request-context';
import { ValidationError } from '@/application/errors/application.error';

const HEADERS = {
  tenantId: 'X-Tenant-Id',
  branchId: 'X-Branch-Id',
  userId: 'X-User-Id',
} as const satisfies Record<keyof RequestContext, string>;

/**
 * Builds the caller's identity from the headers the gateway forwards after
 * authenticating the bearer token. Each header must be a UUID.
 */
export function extractTenantContext(ctx: ExecutionContext): RequestContext {
  const request = ctx.switchToHttp().getRequest<FastifyRequest>();
  const fields: Record<string, string> = {};

  const read = (key: keyof RequestContext): string => {
    const header = HEADERS[key];
    const raw = request.headers[header.toLowerCase()];
    const value = (Array.isArray(raw) ? raw[0] : raw)?.trim() ?? '';
    if (!isUUID(value)) {
      fields[header] = 'Must be a UUID';
    }
    return value;
  };

  const context: RequestContext = {
    tenantId: read('tenantId'),
    branchId: read('branchId'),
    userId: read('userId'),
  };

  const invalid = Object.keys(fields);
  if (invalid.length > 0) {
    throw new ValidationError(`Missing or invalid identity headers: ${invalid.join(', ')}.`, fields);
  }
  return context;
}

export const TenantContext = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestContext => extractTenantContext(ctx),
);
