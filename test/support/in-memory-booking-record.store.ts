import { BookingRecordStore } from '../../src/modules/booking/booking-record-store.interface';
import { assertTransition } from '../../src/modules/booking/booking-state';
import {
  BookingRecord,
  BookingStatus,
  BookingTransitionFields,
  NewBooking,
} from '../../src/modules/booking/booking.types';

export interface RecordedTransition {
  bookingId: string;
  from: BookingStatus;
  to: BookingStatus;
  fields: BookingTransitionFields;
}

/**
 * BookingRecordStore kept in a Map. Each conditional write checks and
 * applies in one synchronous step, so concurrent callers behave like they
 * do against findOneAndUpdate.
 */
export class InMemoryBookingRecordStore implements BookingRecordStore {
  readonly transitions: RecordedTransition[] = [];
  private readonly records = new Map<string, BookingRecord>();
  private sequence = 0;
  private createFailure: Error | null = null;

  nextId(): string {
    this.sequence += 1;
    return `booking-${this.sequence}`;
  }

  /** Make the next `create` reject with `error` */
  failNextCreate(error: Error): void {
    this.createFailure = error;
  }

  seed(record: BookingRecord): BookingRecord {
    this.records.set(record.id, { ...record });
    return record;
  }

  get(bookingId: string): BookingRecord | undefined {
    const record = this.records.get(bookingId);
    return record ? { ...record } : undefined;
  }

  all(): BookingRecord[] {
    return Array.from(this.records.values(), (record) => ({ ...record }));
  }

  async create(booking: NewBooking): Promise<BookingRecord> {
    await Promise.resolve();

    if (this.createFailure) {
      const error = this.createFailure;
      this.createFailure = null;
      throw error;
    }

    const record: BookingRecord = {
      ...booking,
      seats: booking.seats.map((seat) => ({ ...seat })),
      status: BookingStatus.PENDING,
      externalOrderId: null,
      externalPaymentId: null,
      paymentReceivedAt: null,
      confirmedAt: null,
      closedAt: null,
      closureReason: null,
    };
    this.records.set(record.id, record);
    return { ...record };
  }

  async findById(bookingId: string): Promise<BookingRecord | null> {
    await Promise.resolve();
    return this.get(bookingId) ?? null;
  }

  async findByExternalOrderId(
    externalOrderId: string,
  ): Promise<BookingRecord | null> {
    await Promise.resolve();
    return (
      this.all().find((record) => record.externalOrderId === externalOrderId) ??
      null
    );
  }

  async findPendingByUserAndShowtime(
    userId: string,
    showtimeId: string,
  ): Promise<BookingRecord[]> {
    await Promise.resolve();
    return this.all().filter(
      (record) =>
        record.userId === userId &&
        record.showtimeId === showtimeId &&
        record.status === BookingStatus.PENDING,
    );
  }

  async findConfirmedSeatIds(
    showtimeId: string,
    seatIds?: string[],
  ): Promise<string[]> {
    await Promise.resolve();
    const wanted = seatIds ? new Set(seatIds) : null;
    const confirmed = new Set<string>();

    for (const record of this.records.values()) {
      if (
        record.showtimeId !== showtimeId ||
        record.status !== BookingStatus.CONFIRMED
      ) {
        continue;
      }
      for (const seat of record.seats) {
        if (!wanted || wanted.has(seat.seatId)) {
          confirmed.add(seat.seatId);
        }
      }
    }

    return Array.from(confirmed);
  }

  async findExpiredPending(now: Date, limit: number): Promise<BookingRecord[]> {
    await Promise.resolve();
    return this.all()
      .filter(
        (record) =>
          record.status === BookingStatus.PENDING &&
          record.expiresAt.getTime() < now.getTime(),
      )
      .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime())
      .slice(0, limit);
  }

  async transition(
    bookingId: string,
    from: BookingStatus,
    to: BookingStatus,
    fields: BookingTransitionFields,
  ): Promise<BookingRecord | null> {
    assertTransition(from, to);
    await Promise.resolve();

    const record = this.records.get(bookingId);
    if (!record || record.status !== from) {
      return null;
    }

    this.transitions.push({ bookingId, from, to, fields: { ...fields } });
    const updated: BookingRecord = {
      ...record,
      status: to,
      externalPaymentId: fields.externalPaymentId ?? record.externalPaymentId,
      paymentReceivedAt: fields.paymentReceivedAt ?? record.paymentReceivedAt,
      confirmedAt: fields.confirmedAt ?? record.confirmedAt,
      closedAt: fields.closedAt ?? record.closedAt,
      closureReason: fields.closureReason ?? record.closureReason,
    };
    this.records.set(bookingId, updated);
    return { ...updated };
  }

  async setExternalOrderId(
    bookingId: string,
    externalOrderId: string,
  ): Promise<BookingRecord | null> {
    await Promise.resolve();

    const record = this.records.get(bookingId);
    if (
      !record ||
      record.status !== BookingStatus.PENDING ||
      record.externalOrderId !== null
    ) {
      return null;
    }

    const updated: BookingRecord = { ...record, externalOrderId };
    this.records.set(bookingId, updated);
    return { ...updated };
  }

  async recordPaymentOnClosed(
    bookingId: string,
    externalPaymentId: string,
    receivedAt: Date,
  ): Promise<BookingRecord | null> {
    await Promise.resolve();

    const record = this.records.get(bookingId);
    if (
      !record ||
      record.status === BookingStatus.PENDING ||
      record.paymentReceivedAt !== null
    ) {
      return null;
    }

    const updated: BookingRecord = {
      ...record,
      externalPaymentId,
      paymentReceivedAt: receivedAt,
    };
    this.records.set(bookingId, updated);
    return { ...updated };
  }
}
