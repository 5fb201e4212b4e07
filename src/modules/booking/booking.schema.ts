import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { SeatType } from '../showtime/showtime.schema';
import { BookingStatus, ClosureReason } from './booking.types';

/**
 * Individual seat information in a booking
 */
@Schema({ _id: false })
export class BookedSeat {
  @Prop({
    required: true,
    type: String,
    comment: 'Seat identifier (e.g., "A1", "B5")',
  })
  seat_id!: string;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(SeatType),
    default: SeatType.STANDARD,
  })
  seat_type!: SeatType;

  @Prop({
    required: true,
    min: 0,
    comment: 'Seat price in minor currency units',
  })
  price!: number;
}

export const BookedSeatSchema = SchemaFactory.createForClass(BookedSeat);

export type BookingDocument = HydratedDocument<Booking>;

@Schema({
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
  collection: 'bookings',
})
export class Booking {
  @Prop({
    required: true,
    unique: true,
    trim: true,
    uppercase: true,
    maxlength: 20,
    comment: 'Human-readable booking code (e.g., "BK-ABC12345")',
  })
  booking_code!: string;

  @Prop({
    required: true,
    type: String,
    index: true,
    comment: 'Subject of the identity service token',
  })
  user_id!: string;

  @Prop({
    required: true,
    type: Types.ObjectId,
    ref: 'Showtime',
  })
  showtime_id!: Types.ObjectId;

  @Prop({
    type: [BookedSeatSchema],
    required: true,
    validate: {
      validator: (seats: BookedSeat[]) =>
        seats.length > 0 &&
        seats.length <= 10 &&
        new Set(seats.map((seat) => seat.seat_id)).size === seats.length,
      message: 'Booking must have between 1 and 10 distinct seats',
    },
  })
  seats!: BookedSeat[];

  @Prop({
    required: true,
    type: String,
    enum: Object.values(BookingStatus),
    default: BookingStatus.PENDING,
  })
  status!: BookingStatus;

  @Prop({ required: true, min: 0, comment: 'Sum of seat prices' })
  base_amount!: number;

  @Prop({ required: true, min: 0 })
  fee_amount!: number;

  @Prop({ required: true, min: 0 })
  tax_amount!: number;

  @Prop({
    required: true,
    min: 0,
    comment: 'base_amount + fee_amount + tax_amount',
  })
  total_amount!: number;

  @Prop({
    required: true,
    type: String,
    maxlength: 10,
    comment: 'Currency code (e.g., INR)',
  })
  currency!: string;

  @Prop({ type: String, default: null })
  external_order_id!: string | null;

  @Prop({ type: String, default: null })
  external_payment_id!: string | null;

  @Prop({
    type: Date,
    default: null,
    comment: 'Set once, by the first payment that reaches this booking',
  })
  payment_received_at!: Date | null;

  @Prop({
    required: true,
    type: Date,
    immutable: true,
    comment: 'End of the hold window, fixed at creation',
  })
  expires_at!: Date;

  @Prop({ type: Date, default: null })
  confirmed_at!: Date | null;

  @Prop({
    type: Date,
    default: null,
    comment: 'When the booking left PENDING for a non-confirmed state',
  })
  closed_at!: Date | null;

  @Prop({
    type: String,
    enum: [...Object.values(ClosureReason), null],
    default: null,
  })
  closure_reason!: ClosureReason | null;

  created_at!: Date;
  updated_at!: Date;
}

export const BookingSchema = SchemaFactory.createForClass(Booking);

// One provider order maps to one booking
BookingSchema.index(
  { external_order_id: 1 },
  {
    unique: true,
    partialFilterExpression: { external_order_id: { $type: 'string' } },
  },
);

// Overlap checks against confirmed seats
BookingSchema.index({ showtime_id: 1, status: 1, 'seats.seat_id': 1 });

// Superseding a user's pending selection
BookingSchema.index({ user_id: 1, showtime_id: 1, status: 1 });

// Reconciler sweep of expired pending bookings
BookingSchema.index(
  { expires_at: 1 },
  { partialFilterExpression: { status: BookingStatus.PENDING } },
);
