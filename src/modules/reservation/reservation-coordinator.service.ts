import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../../common/errors';
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
  SHOWTIME_CATALOG,
  ShowtimeCatalog,
  ShowtimeLayoutSeat,
  ShowtimeView,
} from '../showtime/showtime-catalog.interface';
import { SeatType, ShowtimeStatus } from '../showtime/showtime.schema';
import { PriceCalculator } from './price-calculator.service';

export const DEFAULT_HOLD_WINDOW_SECONDS = 720;
export const MAX_SEATS_PER_BOOKING = 10;

export interface SeatSelection {
  showtimeId: string;
  seatIds: string[];
  priceTier?: SeatType;
}

export interface SeatAvailability {
  showtimeId: string;
  booked: string[];
  held: string[];
  available: string[];
}

/**
 * ReservationCoordinator turns a seat selection into a hold plus a PENDING
 * booking, and owns the user-initiated exits from PENDING.
 *
 * Flow for `selectSeats`:
 * 1. Validate the showtime and the seat selection
 * 2. Refuse seats that already belong to a CONFIRMED booking
 * 3. Supersede the user's other PENDING booking for the same showtime
 * 4. Acquire the hold, all seats or none, with the new booking id as holder.
 *    Seats still held by a booking superseded in step 3 are taken over.
 * 5. Re-check CONFIRMED ownership, in case a confirmation landed meanwhile
 * 6. Persist the booking; on failure release the hold
 * 7. Settle concurrent selections by the same user: only the newest
 *    PENDING booking for the showtime survives
 *
 * The hold TTL is the only timeout that matters. `releaseHint` lets a
 * client give seats back early, but nothing depends on it.
 */
@Injectable()
export class ReservationCoordinator {
  private readonly logger = new Logger(ReservationCoordinator.name);
  private readonly holdWindowMs: number;

  constructor(
    @Inject(HOLD_STORE)
    private readonly holdStore: HoldStore,
    @Inject(BOOKING_RECORD_STORE)
    private readonly bookingStore: BookingRecordStore,
    @Inject(SHOWTIME_CATALOG)
    private readonly showtimeCatalog: ShowtimeCatalog,
    private readonly priceCalculator: PriceCalculator,
    configService: ConfigService,
  ) {
    const holdWindowSeconds =
      configService.get<number>('HOLD_WINDOW_SECONDS') ??
      DEFAULT_HOLD_WINDOW_SECONDS;
    this.holdWindowMs = holdWindowSeconds * 1000;
  }

  /**
   * Hold the selected seats and create a PENDING booking for them
   *
   * @throws NotFoundError when the showtime does not exist
   * @throws ValidationError when the showtime or the selection is not bookable
   * @throws ConflictError listing exactly the seats that are taken
   */
  async selectSeats(
    userId: string,
    selection: SeatSelection,
    now: Date = new Date(),
  ): Promise<BookingRecord> {
    const { showtimeId, seatIds } = selection;

    const showtime = await this.showtimeCatalog.findById(showtimeId);
    if (!showtime) {
      throw new NotFoundError('SHOWTIME', showtimeId);
    }
    const layoutSeats = this.validateSelection(showtime, selection, now);

    const alreadyBooked = await this.bookingStore.findConfirmedSeatIds(
      showtimeId,
      seatIds,
    );
    if (alreadyBooked.length > 0) {
      throw new ConflictError(this.inRequestOrder(seatIds, alreadyBooked));
    }

    const superseded = await this.supersedePending(userId, showtimeId, now);

    const bookingId = this.bookingStore.nextId();
    const hold = await this.holdStore.acquire(
      showtimeId,
      seatIds,
      bookingId,
      this.holdWindowMs,
      superseded,
    );

    if (!hold.granted) {
      this.logger.debug(
        `selectSeats conflict - showtimeId: ${showtimeId}, seats: ${hold.conflicts.join(',')}`,
      );
      throw new ConflictError(this.inRequestOrder(seatIds, hold.conflicts));
    }

    const bookedMeanwhile = await this.bookingStore.findConfirmedSeatIds(
      showtimeId,
      seatIds,
    );
    if (bookedMeanwhile.length > 0) {
      await this.releaseAfterFailure(showtimeId, seatIds, bookingId);
      throw new ConflictError(this.inRequestOrder(seatIds, bookedMeanwhile));
    }

    const { seats, breakdown } = this.priceCalculator.price(
      layoutSeats,
      showtime.prices,
    );

    let booking: BookingRecord;
    try {
      booking = await this.bookingStore.create({
        id: bookingId,
        bookingCode: this.generateBookingCode(),
        userId,
        showtimeId,
        seats,
        ...breakdown,
        expiresAt: new Date(now.getTime() + this.holdWindowMs),
        createdAt: now,
      });
    } catch (error) {
      this.logger.error(
        `Failed to persist booking ${bookingId}, releasing hold: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      await this.releaseAfterFailure(showtimeId, seatIds, bookingId);
      throw error;
    }

    this.logger.log(
      `Seats held - bookingId: ${booking.id}, showtimeId: ${showtimeId}, seats: ${seatIds.join(',')}, expiresAt: ${booking.expiresAt.toISOString()}`,
    );
    return this.settleLiveSelection(booking, now);
  }

  /**
   * Cancel a PENDING booking on the owner's request
   *
   * @throws ValidationError BOOKING_NOT_PENDING once the booking has left PENDING
   */
  async cancelBooking(
    bookingId: string,
    userId: string,
    now: Date = new Date(),
  ): Promise<BookingRecord> {
    const booking = await this.getBooking(bookingId, userId);

    const cancelled =
      booking.status === BookingStatus.PENDING
        ? await this.closePending(booking, ClosureReason.USER_CANCELLED, now)
        : null;

    if (!cancelled) {
      const current = (await this.bookingStore.findById(bookingId)) ?? booking;
      throw new ValidationError(
        'BOOKING_NOT_PENDING',
        `Booking is ${current.status} and can no longer be cancelled`,
        { status: current.status },
      );
    }

    this.logger.log(`Booking cancelled - bookingId: ${bookingId}`);
    return cancelled;
  }

  /**
   * Client-side abandonment hint (checkout dismissed, tab closed). Releases
   * the seats early when the booking is still PENDING and otherwise returns
   * the booking untouched.
   */
  async releaseHint(
    bookingId: string,
    userId: string,
    now: Date = new Date(),
  ): Promise<BookingRecord> {
    const booking = await this.getBooking(bookingId, userId);

    if (booking.status !== BookingStatus.PENDING) {
      this.logger.debug(
        `releaseHint no-op - bookingId: ${bookingId}, status: ${booking.status}`,
      );
      return booking;
    }

    const cancelled = await this.closePending(
      booking,
      ClosureReason.USER_CANCELLED,
      now,
    );
    return cancelled ?? (await this.bookingStore.findById(bookingId)) ?? booking;
  }

  /**
   * Owner-only read of a booking
   */
  async getBooking(bookingId: string, userId: string): Promise<BookingRecord> {
    const booking = await this.bookingStore.findById(bookingId);

    if (!booking) {
      throw new NotFoundError('BOOKING', bookingId);
    }

    if (booking.userId !== userId) {
      throw new ForbiddenError();
    }

    return booking;
  }

  /**
   * Seat map for display. Held seats come from the hold snapshot, which
   * may lag by a few milliseconds; it is never used to grant seats.
   */
  async getSeatAvailability(showtimeId: string): Promise<SeatAvailability> {
    const showtime = await this.showtimeCatalog.findById(showtimeId);
    if (!showtime) {
      throw new NotFoundError('SHOWTIME', showtimeId);
    }

    const [bookedIds, heldIds] = await Promise.all([
      this.bookingStore.findConfirmedSeatIds(showtimeId),
      this.holdStore.snapshot(showtimeId),
    ]);
    const booked = new Set(bookedIds);
    const held = new Set(heldIds);

    const availability: SeatAvailability = {
      showtimeId,
      booked: [],
      held: [],
      available: [],
    };

    for (const { seatId } of showtime.seats) {
      if (booked.has(seatId)) {
        availability.booked.push(seatId);
      } else if (held.has(seatId)) {
        availability.held.push(seatId);
      } else {
        availability.available.push(seatId);
      }
    }

    return availability;
  }

  /**
   * Returns the layout entries of the selected seats, in request order
   */
  private validateSelection(
    showtime: ShowtimeView,
    selection: SeatSelection,
    now: Date,
  ): ShowtimeLayoutSeat[] {
    const { seatIds, priceTier } = selection;

    if (showtime.status !== ShowtimeStatus.SCHEDULED) {
      throw new ValidationError(
        'SHOWTIME_NOT_AVAILABLE',
        `Showtime is ${showtime.status} and not open for booking`,
      );
    }

    if (showtime.startTime.getTime() <= now.getTime()) {
      throw new ValidationError(
        'SHOWTIME_STARTED',
        'Showtime has already started',
      );
    }

    if (seatIds.length === 0 || seatIds.length > MAX_SEATS_PER_BOOKING) {
      throw new ValidationError(
        'INVALID_SEAT_COUNT',
        `Select between 1 and ${MAX_SEATS_PER_BOOKING} seats`,
      );
    }

    const duplicates = seatIds.filter(
      (seatId, index) => seatIds.indexOf(seatId) !== index,
    );
    if (duplicates.length > 0) {
      throw new ValidationError('DUPLICATE_SEAT', 'Seats must be distinct', {
        seats: Array.from(new Set(duplicates)),
      });
    }

    const layout = new Map(
      showtime.seats.map((seat) => [seat.seatId, seat] as const),
    );
    const selected: ShowtimeLayoutSeat[] = [];
    const unknown: string[] = [];

    for (const seatId of seatIds) {
      const seat = layout.get(seatId);
      if (seat) {
        selected.push(seat);
      } else {
        unknown.push(seatId);
      }
    }

    if (unknown.length > 0) {
      throw new ValidationError(
        'INVALID_SEAT',
        `Seats do not exist in this showtime: ${unknown.join(', ')}`,
        { invalid_seats: unknown },
      );
    }

    if (priceTier) {
      const mismatched = selected
        .filter((seat) => seat.seatType !== priceTier)
        .map((seat) => seat.seatId);

      if (mismatched.length > 0) {
        throw new ValidationError(
          'INVALID_PRICE_TIER',
          `Seats are not in the ${priceTier} tier: ${mismatched.join(', ')}`,
          { price_tier: priceTier, seats: mismatched },
        );
      }
    }

    const coupleSeats = selected.filter(
      (seat) => seat.seatType === SeatType.COUPLE,
    );
    if (coupleSeats.length % 2 !== 0) {
      throw new ValidationError(
        'INVALID_COUPLE_SELECTION',
        'Couple seats must be booked in pairs',
        { seats: coupleSeats.map((seat) => seat.seatId) },
      );
    }

    return selected;
  }

  /**
   * A user has at most one live selection per showtime: older PENDING
   * bookings are cancelled and their seats released first. Returns the ids
   * of the bookings this call closed.
   */
  private async supersedePending(
    userId: string,
    showtimeId: string,
    now: Date,
  ): Promise<string[]> {
    const pending = await this.bookingStore.findPendingByUserAndShowtime(
      userId,
      showtimeId,
    );

    const closed: string[] = [];
    for (const booking of pending) {
      if (await this.supersede(booking, now)) {
        closed.push(booking.id);
      }
    }
    return closed;
  }

  /**
   * Two selections by the same user can both pass `supersedePending` before
   * either booking exists. Once ours is stored, every PENDING booking of the
   * user for the showtime except the newest (createdAt, then id) is
   * superseded. Concurrent requests agree on the newest, so they converge
   * on one live booking. Returns our booking in its current state.
   */
  private async settleLiveSelection(
    booking: BookingRecord,
    now: Date,
  ): Promise<BookingRecord> {
    const pending = await this.bookingStore.findPendingByUserAndShowtime(
      booking.userId,
      booking.showtimeId,
    );

    const newest = pending.reduce<BookingRecord | null>(
      (latest, candidate) =>
        latest === null || this.isNewer(candidate, latest) ? candidate : latest,
      null,
    );

    for (const other of pending) {
      if (newest !== null && other.id !== newest.id) {
        await this.supersede(other, now);
      }
    }

    if (newest !== null && newest.id === booking.id) {
      return booking;
    }
    return (await this.bookingStore.findById(booking.id)) ?? booking;
  }

  private isNewer(a: BookingRecord, b: BookingRecord): boolean {
    const diff = a.createdAt.getTime() - b.createdAt.getTime();
    return diff !== 0 ? diff > 0 : a.id > b.id;
  }

  private async supersede(
    booking: BookingRecord,
    now: Date,
  ): Promise<BookingRecord | null> {
    const superseded = await this.closePending(
      booking,
      ClosureReason.SUPERSEDED,
      now,
    );
    if (superseded) {
      this.logger.log(
        `Booking superseded - bookingId: ${booking.id}, showtimeId: ${booking.showtimeId}`,
      );
    }
    return superseded;
  }

  /**
   * Conditional PENDING -> CANCELLED, then release the holds it owned.
   * Returns null when the booking had already left PENDING. A failed
   * release is logged and left to the TTL; the booking is CANCELLED
   * either way.
   */
  private async closePending(
    booking: BookingRecord,
    reason: ClosureReason,
    now: Date,
  ): Promise<BookingRecord | null> {
    const cancelled = await this.bookingStore.transition(
      booking.id,
      BookingStatus.PENDING,
      BookingStatus.CANCELLED,
      { closedAt: now, closureReason: reason },
    );

    if (!cancelled) {
      return null;
    }

    try {
      await this.holdStore.release(
        booking.showtimeId,
        seatIdsOf(booking),
        booking.id,
      );
    } catch (error) {
      this.logger.error(
        `Hold release failed after cancel - bookingId: ${booking.id}, seats expire by TTL: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
    return cancelled;
  }

  /**
   * Release after a refused or failed selection. A failure here is logged
   * and the seats fall back to their TTL; the original error is what the
   * caller sees.
   */
  private async releaseAfterFailure(
    showtimeId: string,
    seatIds: string[],
    holderId: string,
  ): Promise<void> {
    try {
      await this.holdStore.release(showtimeId, seatIds, holderId);
    } catch (releaseError) {
      this.logger.error(
        `Rollback release failed - holder: ${holderId}, seats expire by TTL: ${releaseError instanceof Error ? releaseError.message : 'Unknown error'}`,
      );
    }
  }

  private inRequestOrder(requested: string[], subset: string[]): string[] {
    const wanted = new Set(subset);
    return requested.filter((seatId) => wanted.has(seatId));
  }

  private generateBookingCode(): string {
    const chars = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
    let code = 'BK-';
    for (let i = 0; i < 8; i++) {
      code += chars.charAt(Math.floor(Math.random() * chars.length));
    }
    return code;
  }
}
