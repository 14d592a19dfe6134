import { Inject, Injectable, Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { EventPublisher } from '@/application/ports/event-publisher.port';
import { DomainEvent } from '@/core/domain/sale/events/domain-event.interface';
import { REDIS_CLIENT } from '../persistence/redis/redis.tokens';
import { PORTAL_EVENTS_CHANNEL, toPortalMessage } from './portal-message';

@Injectable()
export class RedisEventPublisher implements EventPublisher {
  private readonly logger = new Logger(RedisEventPublisher.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  async publish(event: DomainEvent): Promise<void> {
    const message = toPortalMessage(event);
    if (!message) {
      this.logger.warn(`No portal mapping for ${event.constructor.name}, skipping`);
      return;
    }
    const receivers = await this.redis.publish(PORTAL_EVENTS_CHANNEL, JSON.stringify(message));
    this.logger.debug(
      `Published ${message.event} to ${PORTAL_EVENTS_CHANNEL} (${receivers} subscribers)`,
    );
  }
}
