import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { AppConfigModule } from './infrastructure/config/app-config.module';
import { CrossCuttingModule } from './infrastructure/cross-cutting.module';
import { RedisModule } from './infrastructure/persistence/redis/redis.module';
import { PostgresqlModule } from './infrastructure/persistence/postgresql/postgresql.module';
import { BullmqModule } from './infrastructure/messaging/bullmq/bullmq.module';
import { EventsModule } from './events.module';
import { SaleModule } from './sale.module';
import { InventoryModule } from './inventory.module';
import { HealthController } from './presentation/http/rest/controllers/health.controller';
import { CorrelationIdMiddleware } from './presentation/http/rest/middleware/correlation-id.middleware';

@Module({
  imports: [
    AppConfigModule,
    CrossCuttingModule,
    RedisModule,
    PostgresqlModule,
    BullmqModule,
    EventsModule,
    SaleModule,
    InventoryModule,
  ],
  controllers: [HealthController],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
