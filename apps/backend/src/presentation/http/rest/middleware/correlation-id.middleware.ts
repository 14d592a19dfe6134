import { Injectable, NestMiddleware } from '@nestjs/common';
import { FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import { isUUID } from 'class-validator';

export interface CorrelationContext {
  correlationId: string;
  tenantId?: string;
}

export const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: FastifyRequest['raw'], res: FastifyReply['raw'], next: () => void): void {
    const correlationId = firstHeader(req.headers['x-correlation-id']) || randomUUID();
    const tenantHeader = firstHeader(req.headers['x-tenant-id'])?.trim();
    const tenantId = tenantHeader && isUUID(tenantHeader) ? tenantHeader : undefined;

    res.setHeader('x-correlation-id', correlationId);
    correlationStorage.run({ correlationId, tenantId }, () => next());
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
