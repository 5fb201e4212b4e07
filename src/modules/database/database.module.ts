import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';

const DEFAULT_MONGO_URI = 'mongodb://localhost:27017/seat-hold';
const DEFAULT_OPERATION_TIMEOUT_MS = 5000;

/**
 * DatabaseModule opens the MongoDB connection shared by the API and the
 * worker. Server selection and socket reads are bounded so a stalled
 * primary fails the request instead of hanging it.
 */
@Module({
  imports: [
    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => {
        const timeoutMs =
          configService.get<number>('MONGO_OPERATION_TIMEOUT_MS') ??
          DEFAULT_OPERATION_TIMEOUT_MS;

        return {
          uri: configService.get<string>('MONGO_URI') || DEFAULT_MONGO_URI,
          serverSelectionTimeoutMS: timeoutMs,
          socketTimeoutMS: timeoutMs * 2,
          connectTimeoutMS: 10000,
        };
      },
      inject: [ConfigService],
    }),
  ],
})
export class DatabaseModule {}
