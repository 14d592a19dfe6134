import { Controller, Get, HttpStatus, Logger, Res } from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { MetricsService } from './metrics.service';

@Controller('metrics')
export class MetricsController {
  private readonly logger = new Logger(MetricsController.name);

  constructor(private readonly metrics: MetricsService) {}

  // @Res() bypasses the response wrapper and the exception filter.
  @Get()
  async getMetrics(@Res() reply: FastifyReply): Promise<void> {
    try {
      const metrics = await this.metrics.getMetrics();
      reply
        .header('Content-Type', this.metrics.getContentType())
        .header('Cache-Control', 'no-store')
        .send(metrics);
    } catch (error) {
      this.logger.error('Failed to collect metrics', error instanceof Error ? error.stack : error);
      reply.status(HttpStatus.INTERNAL_SERVER_ERROR).header('Cache-Control', 'no-store').send();
    }
  }
}
