import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { configModuleOptions } from './config/env.validation';
import { DatabaseModule } from './modules/database/database.module';
import { RedisModule } from './modules/redis/redis.module';
import { ExpiryModule } from './modules/expiry/expiry.module';

/**
 * WorkerModule - root of the background process running the expiry
 * reconciler on a schedule. Any number of workers may run side by side.
 */
@Module({
  imports: [
    ConfigModule.forRoot(configModuleOptions),
    ScheduleModule.forRoot(),
    DatabaseModule,
    RedisModule,
    ExpiryModule,
  ],
})
export class WorkerModule {}
