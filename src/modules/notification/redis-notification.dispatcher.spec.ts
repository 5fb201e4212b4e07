import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { RedisService } from '../redis/redis.service';
import { NotificationKind } from './notification-dispatcher.interface';
import { RedisNotificationDispatcher } from './redis-notification.dispatcher';
import { createConfigService } from '../../../test/support/fixtures';

describe('RedisNotificationDispatcher', () => {
  let lpush: jest.Mock;
  let dispatcher: RedisNotificationDispatcher;

  beforeEach(async () => {
    lpush = jest.fn().mockResolvedValue(1);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RedisNotificationDispatcher,
        { provide: RedisService, useValue: { lpush } },
        {
          provide: ConfigService,
          useValue: createConfigService({
            NOTIFICATION_QUEUE_KEY: 'test:notifications',
          }),
        },
      ],
    }).compile();

    dispatcher = module.get<RedisNotificationDispatcher>(
      RedisNotificationDispatcher,
    );
  });

  it('should push a JSON task onto the queue', () => {
    dispatcher.enqueue(NotificationKind.BOOKING_CONFIRMATION, 'booking-1');

    expect(lpush).toHaveBeenCalledTimes(1);
    const [key, payload] = lpush.mock.calls[0];
    expect(key).toBe('test:notifications');
    expect(JSON.parse(payload)).toMatchObject({
      kind: 'booking.confirmation',
      bookingId: 'booking-1',
    });
  });

  it('should give every task its own id', () => {
    dispatcher.enqueue(NotificationKind.REFUND_INTENT, 'booking-1');
    dispatcher.enqueue(NotificationKind.REFUND_INTENT, 'booking-1');

    const ids = lpush.mock.calls.map(([, payload]) => JSON.parse(payload).id);
    expect(ids[0]).not.toBe(ids[1]);
  });

  it('should not throw when the queue is unavailable', async () => {
    lpush.mockRejectedValue(new Error('redis down'));

    expect(() =>
      dispatcher.enqueue(NotificationKind.BOOKING_EXPIRED, 'booking-1'),
    ).not.toThrow();
    await new Promise((resolve) => setImmediate(resolve));
  });
});
