import { Module } from '@nestjs/common';
import { BookingModule } from '../booking/booking.module';
import { HoldModule } from '../hold/hold.module';
import { NotificationModule } from '../notification/notification.module';
import { ExpiryReconciler } from './expiry-reconciler.service';

/**
 * ExpiryModule runs the reconciler. Loaded by the worker process only.
 */
@Module({
  imports: [BookingModule, HoldModule, NotificationModule],
  providers: [ExpiryReconciler],
  exports: [ExpiryReconciler],
})
export class ExpiryModule {}
