import { Controller, Get, HttpStatus, Inject, Optional, Res } from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { REDIS_CLIENT } from '@/infrastructure/persistence/redis/redis.tokens';

export const DATA_SOURCE = Symbol('DATA_SOURCE');

interface RedisClient {
  ping(): Promise<string>;
}

interface DataSourceLike {
  query(sql: string): Promise<unknown>;
}

type CheckStatus = 'up' | 'down' | 'not_configured';

interface DependencyCheck {
  status: CheckStatus;
  latencyMs: number;
}

@Controller('health')
export class HealthController {
  constructor(
    @Optional() @Inject(REDIS_CLIENT) private readonly redis?: RedisClient,
    @Optional() @Inject(DATA_SOURCE) private readonly dataSource?: DataSourceLike,
  ) {}

  // @Res() bypasses the response wrapper and the exception filter, so failures
  // are caught here and the status code is set by hand.
  @Get()
  async check(@Res() reply: FastifyReply): Promise<void> {
    const { redis, dataSource } = this;
    try {
      const [redisCheck, pgCheck] = await Promise.all([
        redis ? this.ping(() => redis.ping()) : notConfigured(),
        dataSource ? this.ping(() => dataSource.query('SELECT 1')) : notConfigured(),
      ]);

      const allUp = [redisCheck, pgCheck].every((check) => check.status !== 'down');
      const statusCode = allUp ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE;

      reply.status(statusCode).send({
        success: true,
        data: {
          status: allUp ? 'healthy' : 'degraded',
          uptime: Math.floor(process.uptime()),
          checks: { redis: redisCheck, postgresql: pgCheck },
        },
      });
    } catch {
      reply.status(HttpStatus.INTERNAL_SERVER_ERROR).send({
        success: false,
        error: { code: 'HEALTH_CHECK_ERROR', message: 'Health check failed unexpectedly' },
      });
    }
  }

  private async ping(fn: () => Promise<unknown>): Promise<DependencyCheck> {
    const start = Date.now();
    try {
      await fn();
      return { status: 'up', latencyMs: Date.now() - start };
    } catch {
      return { status: 'down', latencyMs: Date.now() - start };
    }
  }
}

function notConfigured(): Promise<DependencyCheck> {
  return Promise.resolve({ status: 'not_configured', latencyMs: 0 });
}
