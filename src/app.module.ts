import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { configModuleOptions } from './config/env.validation';
import { CommonModule } from './common/common.module';

// Feature modules
import { DatabaseModule } from './modules/database/database.module';
import { RedisModule } from './modules/redis/redis.module';
import { HealthModule } from './modules/health/health.module';
import { ReservationModule } from './modules/reservation/reservation.module';
import { PaymentModule } from './modules/payment/payment.module';

/**
 * AppModule - root of the HTTP API process
 *
 * - ConfigModule: validated environment, global
 * - DatabaseModule: MongoDB connection for bookings and showtimes
 * - RedisModule: Redis client for holds and the notification queue (global)
 * - CommonModule: JWT verification and payment signatures (global)
 * - ReservationModule: seat selection, holds, cancellation, seat map
 * - PaymentModule: provider orders, redirect callback and webhook
 *
 * Scheduled work lives in WorkerModule, not here.
 */
@Module({
  imports: [
    ConfigModule.forRoot(configModuleOptions),
    DatabaseModule,
    RedisModule,
    CommonModule,
    HealthModule,
    ReservationModule,
    PaymentModule,
  ],
})
export class AppModule {}
