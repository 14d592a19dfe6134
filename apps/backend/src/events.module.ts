import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggingEventPublisher } from './infrastructure/messaging/logging-event-publisher.adapter';
import { RedisEventPublisher } from './infrastructure/messaging/redis-event-publisher.adapter';
import { EVENT_PUBLISHER, EventPublisher } from './application/ports/event-publisher.port';

@Global()
@Module({
  providers: [
    LoggingEventPublisher,
    {
      provide: EVENT_PUBLISHER,
      useFactory: (
        configService: ConfigService,
        redisPublisher: RedisEventPublisher,
        loggingPublisher: LoggingEventPublisher,
      ): EventPublisher =>
        configService.get<string>('EVENT_TRANSPORT', 'redis') === 'log'
          ? loggingPublisher
          : redisPublisher,
      inject: [ConfigService, RedisEventPublisher, LoggingEventPublisher],
    },
  ],
  exports: [EVENT_PUBLISHER],
})
export class EventsModule {}
