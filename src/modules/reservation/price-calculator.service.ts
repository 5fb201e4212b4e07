import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BookingSeat, PriceBreakdown } from '../booking/booking.types';
import {
  SeatPriceTable,
  ShowtimeLayoutSeat,
} from '../showtime/showtime-catalog.interface';

export interface PricingPolicy {
  /** Flat booking fee, minor units */
  feeAmount: number;
  /** Applied to base + fee */
  taxRate: number;
  currency: string;
}

export interface PricedSelection {
  seats: BookingSeat[];
  breakdown: PriceBreakdown;
}

export const DEFAULT_PRICING_POLICY: PricingPolicy = {
  feeAmount: 3000,
  taxRate: 0.18,
  currency: 'INR',
};

/**
 * base = sum of seat tier prices
 * tax  = round((base + fee) * taxRate)
 * total = base + fee + tax
 */
export function priceSeats(
  seats: ShowtimeLayoutSeat[],
  prices: SeatPriceTable,
  policy: PricingPolicy,
): PricedSelection {
  const priced: BookingSeat[] = seats.map((seat) => ({
    seatId: seat.seatId,
    seatType: seat.seatType,
    price: prices[seat.seatType],
  }));

  const baseAmount = priced.reduce((sum, seat) => sum + seat.price, 0);
  const feeAmount = policy.feeAmount;
  const taxAmount = Math.round((baseAmount + feeAmount) * policy.taxRate);

  return {
    seats: priced,
    breakdown: {
      baseAmount,
      feeAmount,
      taxAmount,
      totalAmount: baseAmount + feeAmount + taxAmount,
      currency: policy.currency,
    },
  };
}

/**
 * Prices a seat selection with the configured fee, tax rate and currency
 */
@Injectable()
export class PriceCalculator {
  private readonly policy: PricingPolicy;

  constructor(configService: ConfigService) {
    this.policy = {
      feeAmount:
        configService.get<number>('BOOKING_FEE_MINOR') ??
        DEFAULT_PRICING_POLICY.feeAmount,
      taxRate:
        configService.get<number>('TAX_RATE') ?? DEFAULT_PRICING_POLICY.taxRate,
      currency:
        configService.get<string>('CURRENCY') ?? DEFAULT_PRICING_POLICY.currency,
    };
  }

  price(seats: ShowtimeLayoutSeat[], prices: SeatPriceTable): PricedSelection {
    return priceSeats(seats, prices, this.policy);
  }
}
