import {
  Controller,
  Post,
  Get,
  Delete,
  Body,
  Param,
  UseGuards,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { ReservationCoordinator } from './reservation-coordinator.service';
import { HoldSeatsDto } from './dto';
import { AuthGuard } from '../../common/guards/auth.guard';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { toBookingResponse } from '../booking/booking.presenter';
import { BookingResponse } from '../booking/interfaces/booking-response.interface';

/**
 * Customer side of a booking: hold, look up, cancel, abandon.
 * Every route needs a bearer token.
 */
@Controller('bookings')
@UseGuards(AuthGuard)
export class BookingController {
  constructor(private readonly reservationCoordinator: ReservationCoordinator) {}

  /**
   * Holds the seats and opens a PENDING booking priced at hold time.
   * A pending booking the caller already has for this showtime is
   * superseded.
   *
   * `{ "showtime_id": "65f1a2b3c4d5e6f708192a3b", "seats": ["C1", "C2"] }`
   * answers 201 with the booking and its `expires_at`. 409
   * SEATS_NOT_AVAILABLE lists the taken seats in
   * `details.conflicting_seats`.
   */
  @Post('hold')
  @HttpCode(HttpStatus.CREATED)
  async holdSeats(
    @Body() dto: HoldSeatsDto,
    @CurrentUser('id') userId: string,
  ): Promise<BookingResponse> {
    const booking = await this.reservationCoordinator.selectSeats(userId, {
      showtimeId: dto.showtime_id,
      seatIds: dto.seats,
      priceTier: dto.price_tier,
    });
    return toBookingResponse(booking);
  }

  /** Owner only */
  @Get(':id')
  async getBooking(
    @Param('id') bookingId: string,
    @CurrentUser('id') userId: string,
  ): Promise<BookingResponse> {
    const booking = await this.reservationCoordinator.getBooking(
      bookingId,
      userId,
    );
    return toBookingResponse(booking);
  }

  /** PENDING only; anything else is 400 BOOKING_NOT_PENDING */
  @Delete(':id')
  async cancelBooking(
    @Param('id') bookingId: string,
    @CurrentUser('id') userId: string,
  ): Promise<BookingResponse> {
    const booking = await this.reservationCoordinator.cancelBooking(
      bookingId,
      userId,
    );
    return toBookingResponse(booking);
  }

  /**
   * Early release when the client abandons checkout. Always 200; the
   * response shows the booking's current state.
   */
  @Post(':id/release')
  @HttpCode(HttpStatus.OK)
  async releaseHint(
    @Param('id') bookingId: string,
    @CurrentUser('id') userId: string,
  ): Promise<BookingResponse> {
    const booking = await this.reservationCoordinator.releaseHint(
      bookingId,
      userId,
    );
    return toBookingResponse(booking);
  }
}
