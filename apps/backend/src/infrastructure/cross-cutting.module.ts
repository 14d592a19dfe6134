import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StructuredLogger } from './logging/structured-logger';
import { EnvConfig } from './config/env.validation';
import { MetricsService } from './observability/metrics.service';
import { MetricsController } from './observability/metrics.controller';
import { MetricsInterceptor } from './observability/metrics.interceptor';

@Global()
@Module({
  controllers: [MetricsController],
  providers: [
    {
      provide: StructuredLogger,
      useFactory: (configService: ConfigService) =>
        new StructuredLogger(configService.get<EnvConfig['LOG_LEVEL']>('LOG_LEVEL', 'info')),
      inject: [ConfigService],
    },
    MetricsService,
    MetricsInterceptor,
  ],
  exports: [StructuredLogger, MetricsService, MetricsInterceptor],
})
export class CrossCuttingModule {}
