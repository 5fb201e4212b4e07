import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Booking, BookingSchema } from './booking.schema';
import { BOOKING_RECORD_STORE } from './booking-record-store.interface';
import { MongoBookingRecordStore } from './mongo-booking-record.store';

/**
 * BookingModule owns the durable booking records
 */
@Module({
  imports: [
    MongooseModule.forFeature([{ name: Booking.name, schema: BookingSchema }]),
  ],
  providers: [{ provide: BOOKING_RECORD_STORE, useClass: MongoBookingRecordStore }],
  exports: [BOOKING_RECORD_STORE],
})
export class BookingModule {}
