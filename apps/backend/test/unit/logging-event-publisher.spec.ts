import { Logger } from '@nestjs/common';
import { LoggingEventPublisher } from '../../src/infrastructure/messaging/logging-event-publisher.adapter';
import { SaleCreatedEvent } from '../../src/core/domain/sale/events/sale-created.event';

class TestDomainEvent {
  readonly occurredOn = new Date('2026-02-15T10:00:00Z');
}

describe('LoggingEventPublisher', () => {
  let publisher: LoggingEventPublisher;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    publisher = new LoggingEventPublisher();
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation();
  });

  afterEach(() => {
    logSpy.mockRestore();
    jest.useRealTimers();
  });

  it('should log the class name for events without a portal mapping', async () => {
    await publisher.publish(new TestDomainEvent());

    expect(logSpy).toHaveBeenCalledWith('Domain event: TestDomainEvent at 2026-02-15T10:00:00.000Z');
  });

  it('should log the portal event name and payload for mapped events', async () => {
    jest.useFakeTimers().setSystemTime(new Date('2026-03-10T09:30:00Z'));
    const event = new SaleCreatedEvent('sale-1', 'SALE20264821', 'tenant-1', 'branch-1', 31.5, 1);

    await publisher.publish(event);

    expect(logSpy).toHaveBeenCalledWith(
      'Domain event: sale.created at 2026-03-10T09:30:00.000Z {"saleId":"sale-1","saleNumber":"SALE20264821","totalAmount":31.5,"itemCount":1}',
    );
  });
});
