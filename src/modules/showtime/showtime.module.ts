import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Showtime, ShowtimeSchema } from './showtime.schema';
import { MongoShowtimeCatalog } from './mongo-showtime.catalog';
import { SHOWTIME_CATALOG } from './showtime-catalog.interface';

/**
 * ShowtimeModule exposes the showtime catalog read port
 */
@Module({
  imports: [
    MongooseModule.forFeature([{ name: Showtime.name, schema: ShowtimeSchema }]),
  ],
  providers: [{ provide: SHOWTIME_CATALOG, useClass: MongoShowtimeCatalog }],
  exports: [SHOWTIME_CATALOG],
})
export class ShowtimeModule {}
