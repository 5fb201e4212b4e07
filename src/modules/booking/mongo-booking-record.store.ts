import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { BookingRecordStore } from './booking-record-store.interface';
import { assertTransition } from './booking-state';
import { toBookingRecord, toTransitionSet } from './booking.mapper';
import { Booking } from './booking.schema';
import {
  BookingRecord,
  BookingStatus,
  BookingTransitionFields,
  NewBooking,
} from './booking.types';

const DEFAULT_OPERATION_TIMEOUT_MS = 5000;

/**
 * BookingRecordStore on the `bookings` collection.
 *
 * Conditional writes are single `findOneAndUpdate` calls whose filter
 * carries the expected state, so concurrent writers cannot both succeed.
 * Every query is bounded by `maxTimeMS`.
 */
@Injectable()
export class MongoBookingRecordStore implements BookingRecordStore {
  private readonly logger = new Logger(MongoBookingRecordStore.name);
  private readonly operationTimeoutMs: number;

  constructor(
    @InjectModel(Booking.name)
    private readonly bookingModel: Model<Booking>,
    configService: ConfigService,
  ) {
    this.operationTimeoutMs =
      configService.get<number>('MONGO_OPERATION_TIMEOUT_MS') ??
      DEFAULT_OPERATION_TIMEOUT_MS;
  }

  nextId(): string {
    return new Types.ObjectId().toHexString();
  }

  async create(booking: NewBooking): Promise<BookingRecord> {
    const doc = await this.bookingModel.create({
      _id: new Types.ObjectId(booking.id),
      booking_code: booking.bookingCode,
      user_id: booking.userId,
      showtime_id: new Types.ObjectId(booking.showtimeId),
      seats: booking.seats.map((seat) => ({
        seat_id: seat.seatId,
        seat_type: seat.seatType,
        price: seat.price,
      })),
      status: BookingStatus.PENDING,
      base_amount: booking.baseAmount,
      fee_amount: booking.feeAmount,
      tax_amount: booking.taxAmount,
      total_amount: booking.totalAmount,
      currency: booking.currency,
      expires_at: booking.expiresAt,
      created_at: booking.createdAt,
    });

    this.logger.debug(
      `create - bookingId: ${booking.id}, expiresAt: ${booking.expiresAt.toISOString()}`,
    );

    return toBookingRecord(doc);
  }

  async findById(bookingId: string): Promise<BookingRecord | null> {
    if (!Types.ObjectId.isValid(bookingId)) {
      return null;
    }

    const doc = await this.bookingModel
      .findById(bookingId)
      .maxTimeMS(this.operationTimeoutMs)
      .exec();

    return doc ? toBookingRecord(doc) : null;
  }

  async findByExternalOrderId(
    externalOrderId: string,
  ): Promise<BookingRecord | null> {
    const doc = await this.bookingModel
      .findOne({ external_order_id: externalOrderId })
      .maxTimeMS(this.operationTimeoutMs)
      .exec();

    return doc ? toBookingRecord(doc) : null;
  }

  async findPendingByUserAndShowtime(
    userId: string,
    showtimeId: string,
  ): Promise<BookingRecord[]> {
    if (!Types.ObjectId.isValid(showtimeId)) {
      return [];
    }

    const docs = await this.bookingModel
      .find({
        user_id: userId,
        showtime_id: new Types.ObjectId(showtimeId),
        status: BookingStatus.PENDING,
      })
      .maxTimeMS(this.operationTimeoutMs)
      .exec();

    return docs.map(toBookingRecord);
  }

  async findConfirmedSeatIds(
    showtimeId: string,
    seatIds?: string[],
  ): Promise<string[]> {
    if (!Types.ObjectId.isValid(showtimeId)) {
      return [];
    }

    const docs = await this.bookingModel
      .find({
        showtime_id: new Types.ObjectId(showtimeId),
        status: BookingStatus.CONFIRMED,
        ...(seatIds && { 'seats.seat_id': { $in: seatIds } }),
      })
      .select('seats')
      .maxTimeMS(this.operationTimeoutMs)
      .exec();

    const wanted = seatIds ? new Set(seatIds) : null;
    const confirmed = new Set<string>();

    for (const doc of docs) {
      for (const seat of doc.seats) {
        if (!wanted || wanted.has(seat.seat_id)) {
          confirmed.add(seat.seat_id);
        }
      }
    }

    return Array.from(confirmed);
  }

  async findExpiredPending(now: Date, limit: number): Promise<BookingRecord[]> {
    const docs = await this.bookingModel
      .find({
        status: BookingStatus.PENDING,
        expires_at: { $lt: now },
      })
      .sort({ expires_at: 1 })
      .limit(limit)
      .maxTimeMS(this.operationTimeoutMs)
      .exec();

    return docs.map(toBookingRecord);
  }

  async transition(
    bookingId: string,
    from: BookingStatus,
    to: BookingStatus,
    fields: BookingTransitionFields,
  ): Promise<BookingRecord | null> {
    assertTransition(from, to);

    if (!Types.ObjectId.isValid(bookingId)) {
      return null;
    }

    const doc = await this.bookingModel
      .findOneAndUpdate(
        { _id: new Types.ObjectId(bookingId), status: from },
        { $set: { ...toTransitionSet(fields), status: to } },
        { new: true },
      )
      .maxTimeMS(this.operationTimeoutMs)
      .exec();

    if (!doc) {
      this.logger.debug(
        `transition lost - bookingId: ${bookingId}, ${from} -> ${to}`,
      );
      return null;
    }

    return toBookingRecord(doc);
  }

  async setExternalOrderId(
    bookingId: string,
    externalOrderId: string,
  ): Promise<BookingRecord | null> {
    if (!Types.ObjectId.isValid(bookingId)) {
      return null;
    }

    const doc = await this.bookingModel
      .findOneAndUpdate(
        {
          _id: new Types.ObjectId(bookingId),
          status: BookingStatus.PENDING,
          external_order_id: null,
        },
        { $set: { external_order_id: externalOrderId } },
        { new: true },
      )
      .maxTimeMS(this.operationTimeoutMs)
      .exec();

    return doc ? toBookingRecord(doc) : null;
  }

  async recordPaymentOnClosed(
    bookingId: string,
    externalPaymentId: string,
    receivedAt: Date,
  ): Promise<BookingRecord | null> {
    if (!Types.ObjectId.isValid(bookingId)) {
      return null;
    }

    const doc = await this.bookingModel
      .findOneAndUpdate(
        {
          _id: new Types.ObjectId(bookingId),
          status: { $ne: BookingStatus.PENDING },
          payment_received_at: null,
        },
        {
          $set: {
            external_payment_id: externalPaymentId,
            payment_received_at: receivedAt,
          },
        },
        { new: true },
      )
      .maxTimeMS(this.operationTimeoutMs)
      .exec();

    return doc ? toBookingRecord(doc) : null;
  }
}
