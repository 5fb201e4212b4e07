import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
} from '../../common/errors';
import { BOOKING_RECORD_STORE } from '../booking/booking-record-store.interface';
import { BookingStatus, ClosureReason } from '../booking/booking.types';
import { HOLD_STORE } from '../hold/hold-store.interface';
import { SHOWTIME_CATALOG } from '../showtime/showtime-catalog.interface';
import { SeatType, ShowtimeStatus } from '../showtime/showtime.schema';
import { PriceCalculator } from './price-calculator.service';
import { ReservationCoordinator } from './reservation-coordinator.service';
import {
  FakeShowtimeCatalog,
  SHOWTIME_ID,
  buildShowtime,
} from '../../../test/support/fake-showtime.catalog';
import {
  T0,
  at,
  buildBooking,
  createConfigService,
} from '../../../test/support/fixtures';
import { InMemoryBookingRecordStore } from '../../../test/support/in-memory-booking-record.store';
import { InMemoryHoldStore } from '../../../test/support/in-memory-hold.store';

const OTHER_SHOWTIME_ID = '65f1a2b3c4d5e6f708192a3c';

describe('ReservationCoordinator', () => {
  let coordinator: ReservationCoordinator;
  let holdStore: InMemoryHoldStore;
  let bookingStore: InMemoryBookingRecordStore;
  let clockMs: number;

  beforeEach(async () => {
    clockMs = T0.getTime();
    holdStore = new InMemoryHoldStore(() => clockMs);
    bookingStore = new InMemoryBookingRecordStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReservationCoordinator,
        PriceCalculator,
        { provide: HOLD_STORE, useValue: holdStore },
        { provide: BOOKING_RECORD_STORE, useValue: bookingStore },
        {
          provide: SHOWTIME_CATALOG,
          useValue: new FakeShowtimeCatalog(
            buildShowtime(),
            buildShowtime({
              id: OTHER_SHOWTIME_ID,
              startTime: at(60_000),
            }),
          ),
        },
        { provide: ConfigService, useValue: createConfigService() },
      ],
    }).compile();

    coordinator = module.get<ReservationCoordinator>(ReservationCoordinator);
  });

  describe('selectSeats', () => {
    it('should hold the seats and create a priced PENDING booking', async () => {
      const booking = await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['A1', 'A2'] },
        T0,
      );

      expect(booking.id).toBe('booking-1');
      expect(booking.status).toBe(BookingStatus.PENDING);
      expect(booking.bookingCode).toMatch(/^BK-[A-Z0-9]{8}$/);
      expect(booking.baseAmount).toBe(20000);
      expect(booking.feeAmount).toBe(3000);
      expect(booking.taxAmount).toBe(4140);
      expect(booking.totalAmount).toBe(27140);
      expect(booking.currency).toBe('INR');
      expect(booking.expiresAt).toEqual(at(720_000));
      expect(holdStore.holderOf(SHOWTIME_ID, 'A1')).toBe('booking-1');
      expect(holdStore.holderOf(SHOWTIME_ID, 'A2')).toBe('booking-1');
    });

    it('should let exactly one of two overlapping concurrent selections win', async () => {
      const results = await Promise.allSettled([
        coordinator.selectSeats(
          'user-1',
          { showtimeId: SHOWTIME_ID, seatIds: ['A1', 'A2'] },
          T0,
        ),
        coordinator.selectSeats(
          'user-2',
          { showtimeId: SHOWTIME_ID, seatIds: ['A2', 'A3'] },
          T0,
        ),
      ]);

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.filter(
        (r): r is PromiseRejectedResult => r.status === 'rejected',
      );

      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(ConflictError);
      expect(rejected[0].reason).toMatchObject({ conflictingSeats: ['A2'] });
      expect(bookingStore.all()).toHaveLength(1);
    });

    it('should grant a contested seat to one of many concurrent users', async () => {
      const users = ['user-1', 'user-2', 'user-3', 'user-4', 'user-5'];

      const results = await Promise.allSettled(
        users.map((userId) =>
          coordinator.selectSeats(
            userId,
            { showtimeId: SHOWTIME_ID, seatIds: ['B3'] },
            T0,
          ),
        ),
      );

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      expect(bookingStore.all()).toHaveLength(1);
    });

    it('should report only the held seats and hold none of the request', async () => {
      await coordinator.selectSeats(
        'user-2',
        { showtimeId: SHOWTIME_ID, seatIds: ['A2'] },
        T0,
      );

      await expect(
        coordinator.selectSeats(
          'user-1',
          { showtimeId: SHOWTIME_ID, seatIds: ['A1', 'A2', 'A3'] },
          T0,
        ),
      ).rejects.toMatchObject({ conflictingSeats: ['A2'] });

      expect(holdStore.holderOf(SHOWTIME_ID, 'A1')).toBeNull();
      expect(holdStore.holderOf(SHOWTIME_ID, 'A3')).toBeNull();
    });

    it('should refuse seats of a CONFIRMED booking before touching holds', async () => {
      bookingStore.seed(
        buildBooking({ userId: 'user-9', status: BookingStatus.CONFIRMED }),
      );

      await expect(
        coordinator.selectSeats(
          'user-1',
          { showtimeId: SHOWTIME_ID, seatIds: ['A3', 'A1'] },
          T0,
        ),
      ).rejects.toMatchObject({ conflictingSeats: ['A1'] });

      expect(holdStore.acquireCalls).toHaveLength(0);
    });

    it('should release the hold when a confirmation lands during acquisition', async () => {
      jest
        .spyOn(bookingStore, 'findConfirmedSeatIds')
        .mockResolvedValueOnce([])
        .mockResolvedValueOnce(['A2']);

      await expect(
        coordinator.selectSeats(
          'user-1',
          { showtimeId: SHOWTIME_ID, seatIds: ['A1', 'A2'] },
          T0,
        ),
      ).rejects.toMatchObject({ conflictingSeats: ['A2'] });

      expect(holdStore.holderOf(SHOWTIME_ID, 'A1')).toBeNull();
      expect(bookingStore.all()).toHaveLength(0);
    });

    it('should supersede the user\'s earlier PENDING booking for the showtime', async () => {
      const first = await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['A1', 'A2'] },
        T0,
      );

      const second = await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['A2', 'A3'] },
        at(1_000),
      );

      const superseded = bookingStore.get(first.id);
      expect(superseded?.status).toBe(BookingStatus.CANCELLED);
      expect(superseded?.closureReason).toBe(ClosureReason.SUPERSEDED);
      expect(superseded?.closedAt).toEqual(at(1_000));
      expect(holdStore.holderOf(SHOWTIME_ID, 'A1')).toBeNull();
      expect(holdStore.holderOf(SHOWTIME_ID, 'A2')).toBe(second.id);
      expect(second.status).toBe(BookingStatus.PENDING);
    });

    it('should settle two concurrent selections by one user on a single booking', async () => {
      await Promise.all([
        coordinator.selectSeats(
          'user-1',
          { showtimeId: SHOWTIME_ID, seatIds: ['A1'] },
          T0,
        ),
        coordinator.selectSeats(
          'user-1',
          { showtimeId: SHOWTIME_ID, seatIds: ['A3'] },
          T0,
        ),
      ]);

      const live = bookingStore
        .all()
        .filter((booking) => booking.status === BookingStatus.PENDING);
      expect(live.map((booking) => booking.id)).toEqual(['booking-2']);

      const loser = bookingStore.get('booking-1');
      expect(loser?.status).toBe(BookingStatus.CANCELLED);
      expect(loser?.closureReason).toBe(ClosureReason.SUPERSEDED);

      const winnerSeat = live[0].seats[0].seatId;
      const loserSeat = winnerSeat === 'A1' ? 'A3' : 'A1';
      expect(holdStore.holderOf(SHOWTIME_ID, winnerSeat)).toBe('booking-2');
      expect(holdStore.holderOf(SHOWTIME_ID, loserSeat)).toBeNull();
    });

    it('should let the user re-select their own seats when releasing the superseded hold fails', async () => {
      const first = await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['A1'] },
        T0,
      );
      holdStore.failNextRelease(new Error('redis timeout'));

      const second = await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['A1'] },
        at(1_000),
      );

      expect(bookingStore.get(first.id)?.status).toBe(BookingStatus.CANCELLED);
      expect(second.status).toBe(BookingStatus.PENDING);
      expect(holdStore.holderOf(SHOWTIME_ID, 'A1')).toBe(second.id);
      expect(holdStore.acquireCalls[1].replaceable).toEqual([first.id]);
    });

    it('should not take over seats held by another user\'s booking', async () => {
      await coordinator.selectSeats(
        'user-2',
        { showtimeId: SHOWTIME_ID, seatIds: ['A1'] },
        T0,
      );
      await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['A2'] },
        T0,
      );

      await expect(
        coordinator.selectSeats(
          'user-1',
          { showtimeId: SHOWTIME_ID, seatIds: ['A1'] },
          at(1_000),
        ),
      ).rejects.toMatchObject({ conflictingSeats: ['A1'] });
      expect(holdStore.holderOf(SHOWTIME_ID, 'A1')).toBe('booking-1');
    });

    it('should leave PENDING bookings for other showtimes alone', async () => {
      const elsewhere = await coordinator.selectSeats(
        'user-1',
        { showtimeId: OTHER_SHOWTIME_ID, seatIds: ['A1'] },
        T0,
      );

      await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['A1'] },
        T0,
      );

      expect(bookingStore.get(elsewhere.id)?.status).toBe(BookingStatus.PENDING);
    });

    it('should make a seat available again once its hold has lapsed', async () => {
      await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['A1'] },
        T0,
      );

      clockMs = at(720_001).getTime();
      const booking = await coordinator.selectSeats(
        'user-2',
        { showtimeId: SHOWTIME_ID, seatIds: ['A1'] },
        at(720_001),
      );

      expect(holdStore.holderOf(SHOWTIME_ID, 'A1')).toBe(booking.id);
    });

    it('should release the hold and rethrow when the booking cannot be stored', async () => {
      bookingStore.failNextCreate(new Error('write failed'));

      await expect(
        coordinator.selectSeats(
          'user-1',
          { showtimeId: SHOWTIME_ID, seatIds: ['A1', 'A2'] },
          T0,
        ),
      ).rejects.toThrow('write failed');

      expect(holdStore.holderOf(SHOWTIME_ID, 'A1')).toBeNull();
      expect(holdStore.holderOf(SHOWTIME_ID, 'A2')).toBeNull();
    });

    it('should rethrow the create error even when the rollback release fails', async () => {
      bookingStore.failNextCreate(new Error('write failed'));
      holdStore.failNextRelease(new Error('redis down'));

      await expect(
        coordinator.selectSeats(
          'user-1',
          { showtimeId: SHOWTIME_ID, seatIds: ['A1'] },
          T0,
        ),
      ).rejects.toThrow('write failed');
    });

    describe('validation', () => {
      const select = (seatIds: string[], priceTier?: SeatType, now = T0) =>
        coordinator.selectSeats(
          'user-1',
          { showtimeId: SHOWTIME_ID, seatIds, priceTier },
          now,
        );

      it('should throw NotFoundError for an unknown showtime', async () => {
        await expect(
          coordinator.selectSeats(
            'user-1',
            { showtimeId: '65f1a2b3c4d5e6f708192a3d', seatIds: ['A1'] },
            T0,
          ),
        ).rejects.toBeInstanceOf(NotFoundError);
      });

      it('should refuse a showtime that has started', async () => {
        await expect(
          select(['A1'], undefined, new Date('2030-01-01T18:00:00.000Z')),
        ).rejects.toMatchObject({ errorCode: 'SHOWTIME_STARTED' });
      });

      it('should refuse an empty selection', async () => {
        await expect(select([])).rejects.toMatchObject({
          errorCode: 'INVALID_SEAT_COUNT',
        });
      });

      it('should refuse more than ten seats', async () => {
        await expect(
          select([
            'A1', 'A2', 'A3', 'A4', 'A5', 'B1', 'B2', 'B3', 'B4', 'B5', 'C1',
          ]),
        ).rejects.toMatchObject({ errorCode: 'INVALID_SEAT_COUNT' });
      });

      it('should refuse duplicate seats', async () => {
        await expect(select(['A1', 'A1'])).rejects.toMatchObject({
          errorCode: 'DUPLICATE_SEAT',
        });
      });

      it('should refuse seats missing from the layout', async () => {
        await expect(select(['A1', 'Z9'])).rejects.toMatchObject({
          errorCode: 'INVALID_SEAT',
        });
      });

      it('should refuse seats outside the requested price tier', async () => {
        await expect(select(['C1', 'A1'], SeatType.VIP)).rejects.toMatchObject({
          errorCode: 'INVALID_PRICE_TIER',
        });
      });

      it('should refuse an unpaired couple seat', async () => {
        await expect(select(['D1'])).rejects.toMatchObject({
          errorCode: 'INVALID_COUPLE_SELECTION',
        });
      });

      it('should accept couple seats in pairs and price them', async () => {
        const booking = await select(['D1', 'D2'], SeatType.COUPLE);

        expect(booking.baseAmount).toBe(24000);
        expect(booking.taxAmount).toBe(4860);
        expect(booking.totalAmount).toBe(31860);
      });

      it('should not hold anything when validation fails', async () => {
        await expect(select(['A1', 'Z9'])).rejects.toBeDefined();

        expect(holdStore.acquireCalls).toHaveLength(0);
      });
    });

    it('should refuse a cancelled showtime', async () => {
      const module = await Test.createTestingModule({
        providers: [
          ReservationCoordinator,
          PriceCalculator,
          { provide: HOLD_STORE, useValue: holdStore },
          { provide: BOOKING_RECORD_STORE, useValue: bookingStore },
          {
            provide: SHOWTIME_CATALOG,
            useValue: new FakeShowtimeCatalog(
              buildShowtime({ status: ShowtimeStatus.CANCELLED }),
            ),
          },
          { provide: ConfigService, useValue: createConfigService() },
        ],
      }).compile();

      await expect(
        module
          .get(ReservationCoordinator)
          .selectSeats('user-1', { showtimeId: SHOWTIME_ID, seatIds: ['A1'] }, T0),
      ).rejects.toMatchObject({ errorCode: 'SHOWTIME_NOT_AVAILABLE' });
    });
  });

  describe('cancelBooking', () => {
    it('should cancel a PENDING booking and release its seats', async () => {
      const booking = await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['A1', 'A2'] },
        T0,
      );

      const cancelled = await coordinator.cancelBooking(
        booking.id,
        'user-1',
        at(5_000),
      );

      expect(cancelled.status).toBe(BookingStatus.CANCELLED);
      expect(cancelled.closureReason).toBe(ClosureReason.USER_CANCELLED);
      expect(cancelled.closedAt).toEqual(at(5_000));
      expect(holdStore.holderOf(SHOWTIME_ID, 'A1')).toBeNull();
    });

    it('should cancel even when releasing the hold fails, leaving it to lapse', async () => {
      const booking = await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['A1', 'A2'] },
        T0,
      );
      holdStore.failNextRelease(new Error('redis timeout'));

      const cancelled = await coordinator.cancelBooking(
        booking.id,
        'user-1',
        at(5_000),
      );

      expect(cancelled.status).toBe(BookingStatus.CANCELLED);
      expect(bookingStore.get(booking.id)?.status).toBe(BookingStatus.CANCELLED);
      expect(holdStore.holderOf(SHOWTIME_ID, 'A1')).toBe(booking.id);
    });

    it('should refuse a booking that is no longer PENDING', async () => {
      bookingStore.seed(buildBooking({ status: BookingStatus.CONFIRMED }));

      await expect(
        coordinator.cancelBooking('booking-seeded', 'user-1'),
      ).rejects.toMatchObject({
        errorCode: 'BOOKING_NOT_PENDING',
      });
    });

    it('should refuse another user\'s booking', async () => {
      bookingStore.seed(buildBooking());

      await expect(
        coordinator.cancelBooking('booking-seeded', 'user-2'),
      ).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('should throw NotFoundError for an unknown booking', async () => {
      await expect(
        coordinator.cancelBooking('missing', 'user-1'),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('releaseHint', () => {
    it('should release a PENDING booking early', async () => {
      const booking = await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['B1'] },
        T0,
      );

      const released = await coordinator.releaseHint(booking.id, 'user-1', T0);

      expect(released.status).toBe(BookingStatus.CANCELLED);
      expect(holdStore.holderOf(SHOWTIME_ID, 'B1')).toBeNull();
    });

    it('should answer with the cancelled booking when the release fails', async () => {
      const booking = await coordinator.selectSeats(
        'user-1',
        { showtimeId: SHOWTIME_ID, seatIds: ['B1'] },
        T0,
      );
      holdStore.failNextRelease(new Error('redis timeout'));

      await expect(
        coordinator.releaseHint(booking.id, 'user-1', T0),
      ).resolves.toMatchObject({ status: BookingStatus.CANCELLED });
    });

    it('should leave a terminal booking untouched', async () => {
      bookingStore.seed(buildBooking({ status: BookingStatus.CONFIRMED }));

      const result = await coordinator.releaseHint('booking-seeded', 'user-1');

      expect(result.status).toBe(BookingStatus.CONFIRMED);
      expect(bookingStore.transitions).toHaveLength(0);
    });
  });

  describe('getSeatAvailability', () => {
    it('should split the layout into booked, held and available seats', async () => {
      bookingStore.seed(
        buildBooking({ userId: 'user-9', status: BookingStatus.CONFIRMED }),
      );
      await coordinator.selectSeats(
        'user-2',
        { showtimeId: SHOWTIME_ID, seatIds: ['B1'] },
        T0,
      );
      // a stale hold on a booked seat still reads as booked
      await holdStore.acquire(SHOWTIME_ID, ['A1'], 'stale-holder', 60_000);

      const availability = await coordinator.getSeatAvailability(SHOWTIME_ID);

      expect(availability.booked).toEqual(['A1', 'A2']);
      expect(availability.held).toEqual(['B1']);
      expect(availability.available).toEqual([
        'A3', 'A4', 'A5', 'B2', 'B3', 'B4', 'B5', 'C1', 'C2', 'C3',
        'D1', 'D2', 'D3', 'D4',
      ]);
    });
  });
});
