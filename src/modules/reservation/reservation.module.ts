import { Module } from '@nestjs/common';
import { BookingModule } from '../booking/booking.module';
import { HoldModule } from '../hold/hold.module';
import { ShowtimeModule } from '../showtime/showtime.module';
import { BookingController } from './booking.controller';
import { PriceCalculator } from './price-calculator.service';
import { ReservationCoordinator } from './reservation-coordinator.service';
import { ShowtimeSeatsController } from './showtime-seats.controller';

/**
 * ReservationModule handles seat selection, holds and user-initiated
 * release of pending bookings
 */
@Module({
  imports: [BookingModule, HoldModule, ShowtimeModule],
  controllers: [BookingController, ShowtimeSeatsController],
  providers: [ReservationCoordinator, PriceCalculator],
  exports: [ReservationCoordinator],
})
export class ReservationModule {}
