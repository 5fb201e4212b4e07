import { Module } from '@nestjs/common';
import { NOTIFICATION_DISPATCHER } from './notification-dispatcher.interface';
import { RedisNotificationDispatcher } from './redis-notification.dispatcher';

@Module({
  providers: [
    { provide: NOTIFICATION_DISPATCHER, useClass: RedisNotificationDispatcher },
  ],
  exports: [NOTIFICATION_DISPATCHER],
})
export class NotificationModule {}
