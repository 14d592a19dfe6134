import { Logger } from '@nestjs/common';
import { RedisEventPublisher } from '../../src/infrastructure/messaging/redis-event-publisher.adapter';
import { InventoryLowEvent } from '../../src/core/domain/inventory/events/inventory-low.event';

class UnmappedEvent {
  readonly occurredOn = new Date('2026-02-15T10:00:00Z');
}

describe('RedisEventPublisher', () => {
  let publisher: RedisEventPublisher;
  let mockRedis: { publish: jest.Mock };
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    mockRedis = { publish: jest.fn().mockResolvedValue(2) };
    publisher = new RedisEventPublisher(mockRedis as any);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should publish the portal message as JSON on the portal channel', async () => {
    const event = new InventoryLowEvent('tenant-1', 'branch-1', 'product-1', 2, 5);

    await publisher.publish(event);

    expect(mockRedis.publish).toHaveBeenCalledTimes(1);
    const [channel, payload] = mockRedis.publish.mock.calls[0];
    expect(channel).toBe('portal:events');
    expect(JSON.parse(payload)).toEqual({
      event: 'inventory.low',
      tenantId: 'tenant-1',
      branchId: 'branch-1',
      data: { productId: 'product-1', quantityOnHand: 2, reorderLevel: 5 },
      occurredOn: event.occurredOn.toISOString(),
    });
  });

  it('should skip events without a portal mapping', async () => {
    await publisher.publish(new UnmappedEvent());

    expect(mockRedis.publish).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('No portal mapping for UnmappedEvent, skipping');
  });

  it('should propagate publish failures to the caller', async () => {
    mockRedis.publish.mockRejectedValue(new Error('Connection is closed.'));

    await expect(
      publisher.publish(new InventoryLowEvent('tenant-1', 'branch-1', 'product-1', 0, 5)),
    ).rejects.toThrow('Connection is closed.');
  });
});
