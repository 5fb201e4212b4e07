import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

/**
 * Showtime status enum
 * - scheduled: Showtime is scheduled and accepting bookings
 * - cancelled: Showtime has been cancelled
 * - completed: Showtime has ended
 */
export enum ShowtimeStatus {
  SCHEDULED = 'scheduled',
  CANCELLED = 'cancelled',
  COMPLETED = 'completed',
}

/**
 * Seat type enum, also the price tier of the seat
 */
export enum SeatType {
  STANDARD = 'standard',
  VIP = 'vip',
  COUPLE = 'couple',
}

/**
 * Price per seat type, in minor currency units
 */
@Schema({ _id: false })
export class ShowtimePrice {
  @Prop({ required: true, min: 0 })
  standard!: number;

  @Prop({ required: true, min: 0 })
  vip!: number;

  @Prop({
    required: true,
    min: 0,
    comment: 'Price of one seat of a couple pair',
  })
  couple!: number;
}

export const ShowtimePriceSchema = SchemaFactory.createForClass(ShowtimePrice);

/**
 * One seat of the screen layout. Holds live in Redis and ownership in the
 * bookings collection, so the layout carries no availability state.
 */
@Schema({ _id: false })
export class LayoutSeat {
  @Prop({
    required: true,
    type: String,
    enum: Object.values(SeatType),
    default: SeatType.STANDARD,
  })
  seat_type!: SeatType;
}

export const LayoutSeatSchema = SchemaFactory.createForClass(LayoutSeat);

export type ShowtimeDocument = HydratedDocument<Showtime>;

/**
 * Showtime read model, owned by the catalog service. This service only
 * reads it.
 */
@Schema({
  timestamps: true,
  collection: 'showtimes',
})
export class Showtime {
  @Prop({ required: true, type: Types.ObjectId, index: true })
  movie_id!: Types.ObjectId;

  @Prop({ required: true, type: Types.ObjectId, index: true })
  cinema_id!: Types.ObjectId;

  @Prop({ required: true, type: String })
  screen_id!: string;

  @Prop({ required: true, type: Date, index: true })
  start_time!: Date;

  @Prop({ required: true, type: Date })
  end_time!: Date;

  @Prop({ required: true, type: ShowtimePriceSchema })
  price!: ShowtimePrice;

  @Prop({
    type: Map,
    of: LayoutSeatSchema,
    default: new Map(),
    comment: 'Map of seat_id to layout entry',
  })
  seats!: Map<string, LayoutSeat>;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(ShowtimeStatus),
    default: ShowtimeStatus.SCHEDULED,
    index: true,
  })
  status!: ShowtimeStatus;
}

export const ShowtimeSchema = SchemaFactory.createForClass(Showtime);

ShowtimeSchema.index({ status: 1, start_time: 1 });
