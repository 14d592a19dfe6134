import { Injectable, Logger } from '@nestjs/common';
import { EventPublisher } from '@/application/ports/event-publisher.port';
import { DomainEvent } from '@/core/domain/sale/events/domain-event.interface';
import { toPortalMessage } from './portal-message';

@Injectable()
export class LoggingEventPublisher implements EventPublisher {
  private readonly logger = new Logger(LoggingEventPublisher.name);

  async publish(event: DomainEvent): Promise<void> {
    const message = toPortalMessage(event);
    const name = message?.event ?? event.constructor.name;
    this.logger.log(
      `Domain event: ${name} at ${event.occurredOn.toISOString()}${
        message ? ` ${JSON.stringify(message.data)}` : ''
      }`,
    );
  }
}
