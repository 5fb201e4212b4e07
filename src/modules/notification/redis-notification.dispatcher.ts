import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { RedisService } from '../redis/redis.service';
import {
  NotificationDispatcher,
  NotificationKind,
  NotificationTask,
} from './notification-dispatcher.interface';

export const DEFAULT_NOTIFICATION_QUEUE_KEY = 'notifications:queue';

/**
 * Pushes notification tasks as JSON onto a Redis list consumed by the
 * delivery service
 */
@Injectable()
export class RedisNotificationDispatcher implements NotificationDispatcher {
  private readonly logger = new Logger(RedisNotificationDispatcher.name);
  private readonly queueKey: string;

  constructor(
    private readonly redisService: RedisService,
    configService: ConfigService,
  ) {
    this.queueKey =
      configService.get<string>('NOTIFICATION_QUEUE_KEY') ??
      DEFAULT_NOTIFICATION_QUEUE_KEY;
  }

  enqueue(kind: NotificationKind, bookingId: string): void {
    const task: NotificationTask = {
      id: uuidv4(),
      kind,
      bookingId,
      enqueuedAt: new Date().toISOString(),
    };

    this.push(task).catch((error: unknown) => {
      this.logger.error(
        `Failed to queue ${kind} - bookingId: ${bookingId}, error: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    });
  }

  private async push(task: NotificationTask): Promise<void> {
    await this.redisService.lpush(this.queueKey, JSON.stringify(task));
    this.logger.log(
      `Queued ${task.kind} - bookingId: ${task.bookingId}, taskId: ${task.id}`,
    );
  }
}
