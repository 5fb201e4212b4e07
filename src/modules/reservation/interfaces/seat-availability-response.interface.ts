export interface SeatAvailabilityResponse {
  showtime_id: string;
  booked: string[];
  held: string[];
  available: string[];
}
