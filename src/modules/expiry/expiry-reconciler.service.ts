import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import {
  BOOKING_RECORD_STORE,
  BookingRecordStore,
} from '../booking/booking-record-store.interface';
import {
  BookingRecord,
  BookingStatus,
  ClosureReason,
  seatIdsOf,
} from '../booking/booking.types';
import { HOLD_STORE, HoldStore } from '../hold/hold-store.interface';
import {
  NOTIFICATION_DISPATCHER,
  NotificationDispatcher,
  NotificationKind,
} from '../notification/notification-dispatcher.interface';

const DEFAULT_BATCH_SIZE = 100;

export interface SweepResult {
  examined: number;
  expired: number;
  /** Already moved out of PENDING by someone else */
  skipped: number;
  failed: number;
}

/**
 * ExpiryReconciler enforces the hold deadline server-side.
 *
 * Each sweep moves PENDING bookings past `expires_at` to EXPIRED with a
 * conditional write, then releases whatever holds they still own. Several
 * worker instances may sweep at once: a booking confirmed, cancelled or
 * expired elsewhere fails the condition and is skipped.
 */
@Injectable()
export class ExpiryReconciler {
  private readonly logger = new Logger(ExpiryReconciler.name);
  private readonly batchSize: number;
  private running = false;

  constructor(
    @Inject(BOOKING_RECORD_STORE)
    private readonly bookingStore: BookingRecordStore,
    @Inject(HOLD_STORE)
    private readonly holdStore: HoldStore,
    @Inject(NOTIFICATION_DISPATCHER)
    private readonly notificationDispatcher: NotificationDispatcher,
    configService: ConfigService,
  ) {
    this.batchSize =
      configService.get<number>('RECONCILER_BATCH_SIZE') ?? DEFAULT_BATCH_SIZE;
  }

  /**
   * Cron job: runs every minute. A tick that finds the previous sweep
   * still running is skipped.
   */
  @Cron(CronExpression.EVERY_MINUTE)
  async handleCron(): Promise<void> {
    if (this.running) {
      this.logger.debug('Previous sweep still running, skipping tick');
      return;
    }

    this.running = true;
    const startTime = Date.now();
    try {
      const result = await this.sweep(new Date());
      if (result.examined > 0) {
        this.logger.log(
          `Sweep done in ${Date.now() - startTime}ms - examined: ${result.examined}, expired: ${result.expired}, skipped: ${result.skipped}, failed: ${result.failed}`,
        );
      }
    } catch (error) {
      this.logger.error(
        `Sweep failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    } finally {
      this.running = false;
    }
  }

  /**
   * Expire overdue PENDING bookings, oldest first, a batch at a time until
   * a batch comes back short. A full batch that expired nothing (every
   * write failed) ends the sweep; the next tick retries it.
   */
  async sweep(now: Date): Promise<SweepResult> {
    const result: SweepResult = {
      examined: 0,
      expired: 0,
      skipped: 0,
      failed: 0,
    };

    let drained = false;
    while (!drained) {
      const overdue = await this.bookingStore.findExpiredPending(
        now,
        this.batchSize,
      );
      const expiredBefore = result.expired;
      result.examined += overdue.length;

      for (const booking of overdue) {
        try {
          const expired = await this.expire(booking, now);
          if (expired) {
            result.expired++;
          } else {
            result.skipped++;
          }
        } catch (error) {
          result.failed++;
          this.logger.error(
            `Failed to expire booking ${booking.id}: ${error instanceof Error ? error.message : 'Unknown error'}`,
          );
        }
      }

      drained =
        overdue.length < this.batchSize || result.expired === expiredBefore;
    }

    return result;
  }

  private async expire(booking: BookingRecord, now: Date): Promise<boolean> {
    const expired = await this.bookingStore.transition(
      booking.id,
      BookingStatus.PENDING,
      BookingStatus.EXPIRED,
      { closedAt: now, closureReason: ClosureReason.HOLD_EXPIRED },
    );

    if (!expired) {
      this.logger.debug(`Expire skipped - bookingId: ${booking.id}`);
      return false;
    }

    this.logger.log(`Booking expired - bookingId: ${expired.id}`);
    this.notificationDispatcher.enqueue(
      NotificationKind.BOOKING_EXPIRED,
      expired.id,
    );

    // Holds normally lapsed with the TTL already; this clears any left over
    try {
      await this.holdStore.release(
        expired.showtimeId,
        seatIdsOf(expired),
        expired.id,
      );
    } catch (error) {
      this.logger.error(
        `Hold cleanup failed - bookingId: ${expired.id}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
    return true;
  }
}
