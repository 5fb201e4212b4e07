import { Controller, Get, Param } from '@nestjs/common';
import { ReservationCoordinator } from './reservation-coordinator.service';
import { SeatAvailabilityResponse } from './interfaces/seat-availability-response.interface';

/**
 * Public seat map of a showtime
 */
@Controller('showtimes')
export class ShowtimeSeatsController {
  constructor(private readonly reservationCoordinator: ReservationCoordinator) {}

  /**
   * @example
   * GET /api/showtimes/64a7b8c9d0e1f2a3b4c5d6e7/seats
   *
   * Response 200: {
   *   "showtime_id": "64a7b8c9d0e1f2a3b4c5d6e7",
   *   "booked": ["A1"],
   *   "held": ["A2", "A3"],
   *   "available": ["A4", "B1", ...]
   * }
   */
  @Get(':id/seats')
  async getSeats(
    @Param('id') showtimeId: string,
  ): Promise<SeatAvailabilityResponse> {
    const availability =
      await this.reservationCoordinator.getSeatAvailability(showtimeId);

    return {
      showtime_id: availability.showtimeId,
      booked: availability.booked,
      held: availability.held,
      available: availability.available,
    };
  }
}
