import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { ShowtimeCatalog, ShowtimeView } from './showtime-catalog.interface';
import { Showtime, ShowtimeDocument } from './showtime.schema';

const DEFAULT_OPERATION_TIMEOUT_MS = 5000;

/**
 * ShowtimeCatalog backed by the shared `showtimes` collection
 */
@Injectable()
export class MongoShowtimeCatalog implements ShowtimeCatalog {
  private readonly logger = new Logger(MongoShowtimeCatalog.name);
  private readonly operationTimeoutMs: number;

  constructor(
    @InjectModel(Showtime.name)
    private readonly showtimeModel: Model<Showtime>,
    configService: ConfigService,
  ) {
    this.operationTimeoutMs =
      configService.get<number>('MONGO_OPERATION_TIMEOUT_MS') ??
      DEFAULT_OPERATION_TIMEOUT_MS;
  }

  async findById(showtimeId: string): Promise<ShowtimeView | null> {
    if (!Types.ObjectId.isValid(showtimeId)) {
      this.logger.debug(`findById - malformed showtimeId: ${showtimeId}`);
      return null;
    }

    const showtime = await this.showtimeModel
      .findById(showtimeId)
      .maxTimeMS(this.operationTimeoutMs)
      .exec();

    return showtime ? this.toView(showtime) : null;
  }

  private toView(showtime: ShowtimeDocument): ShowtimeView {
    return {
      id: showtime._id.toString(),
      status: showtime.status,
      startTime: showtime.start_time,
      prices: {
        standard: showtime.price.standard,
        vip: showtime.price.vip,
        couple: showtime.price.couple,
      },
      seats: Array.from(showtime.seats.entries()).map(([seatId, seat]) => ({
        seatId,
        seatType: seat.seat_type,
      })),
    };
  }
}
