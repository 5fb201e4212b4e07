import { SeatType, ShowtimeStatus } from './showtime.schema';

export const SHOWTIME_CATALOG = 'SHOWTIME_CATALOG';

export type SeatPriceTable = Record<SeatType, number>;

export interface ShowtimeLayoutSeat {
  seatId: string;
  seatType: SeatType;
}

/**
 * What the reservation flow needs to know about a showtime
 */
export interface ShowtimeView {
  id: string;
  status: ShowtimeStatus;
  startTime: Date;
  prices: SeatPriceTable;
  seats: ShowtimeLayoutSeat[];
}

/**
 * Read port onto the external showtime catalog
 */
export interface ShowtimeCatalog {
  findById(showtimeId: string): Promise<ShowtimeView | null>;
}
